import { execFile } from 'child_process';
import { promisify } from 'util';
import type { ExecutionSession } from './execution-session.js';
import { logger as defaultLogger, type LoggerLike } from './logger.js';
import { withTimeout } from './with-timeout.js';

const execFileAsync = promisify(execFile);

/** Runs one tmux invocation and resolves with its stdout. */
export type TmuxRunner = (args: string[], signal: AbortSignal) => Promise<string>;

export interface TmuxSessionOptions {
  sessionName: string;
  /** Command started in a fresh session by `recover()`, e.g. the agent CLI. */
  startCommand?: string;
  workingDirectory?: string;
  /** Scrollback lines included in `readRecentOutput()`. */
  historyLines?: number;
  commandTimeoutMs?: number;
  tmuxBinary?: string;
  runner?: TmuxRunner;
  logger?: LoggerLike;
}

export class TmuxSession implements ExecutionSession {
  readonly sessionName: string;
  private readonly startCommand: string | undefined;
  private readonly workingDirectory: string | undefined;
  private readonly historyLines: number;
  private readonly commandTimeoutMs: number;
  private readonly runner: TmuxRunner;
  private readonly log: LoggerLike;

  constructor(options: TmuxSessionOptions) {
    this.sessionName = options.sessionName;
    this.startCommand = options.startCommand;
    this.workingDirectory = options.workingDirectory;
    this.historyLines = options.historyLines ?? 200;
    this.commandTimeoutMs = options.commandTimeoutMs ?? 10_000;
    this.log = options.logger ?? defaultLogger;

    const binary = options.tmuxBinary ?? 'tmux';
    this.runner = options.runner ?? (async (args, signal) => {
      const { stdout } = await execFileAsync(binary, args, { signal, encoding: 'utf-8' });
      return stdout;
    });
  }

  async send(command: string): Promise<void> {
    // Literal mode keeps tmux from interpreting key names inside the command.
    await this.tmux(['send-keys', '-t', this.sessionName, '-l', command]);
    await this.tmux(['send-keys', '-t', this.sessionName, 'Enter']);
  }

  async readRecentOutput(): Promise<string> {
    const output = await this.tmux(['capture-pane', '-p', '-J', '-t', this.sessionName, '-S', `-${this.historyLines}`]);
    return output.replace(/\s+$/, '');
  }

  async isResponsive(): Promise<boolean> {
    try {
      await this.tmux(['has-session', '-t', this.sessionName]);
      return true;
    } catch {
      return false;
    }
  }

  async recover(): Promise<void> {
    if (await this.isResponsive()) {
      this.log.warn(`[TmuxSession] Restarting unresponsive session ${this.sessionName}`);
      await this.tmux(['kill-session', '-t', this.sessionName]);
    }

    const args = ['new-session', '-d', '-s', this.sessionName];
    if (this.workingDirectory) {
      args.push('-c', this.workingDirectory);
    }
    if (this.startCommand) {
      args.push(this.startCommand);
    }

    await this.tmux(args);
    this.log.info(`[TmuxSession] Started session ${this.sessionName}`);
  }

  private tmux(args: string[]): Promise<string> {
    return withTimeout((signal) => this.runner(args, signal), this.commandTimeoutMs, `tmux ${args[0]}`);
  }
}
