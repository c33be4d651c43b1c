/**
 * The interactive agent session tasks are dispatched into. The engine relies on
 * these four operations only; `TmuxSession` is the bundled implementation.
 */
export interface ExecutionSession {
  /** Send one command line (submitted as if Enter were pressed). */
  send(command: string): Promise<void>;
  /** Recent visible output, oldest line first. */
  readRecentOutput(): Promise<string>;
  isResponsive(): Promise<boolean>;
  /** Bring an unresponsive session back. */
  recover(): Promise<void>;
}

/**
 * Portion of `output` produced after `baseline` was captured. When the pane has
 * scrolled, the output starts part-way into the baseline; failing that, the
 * last non-empty baseline line is located at its first occurrence. Falls back
 * to the whole output when the baseline can no longer be found.
 */
export function extractNewOutput(output: string, baseline: string): string {
  if (!baseline) {
    return output;
  }

  if (output.startsWith(baseline)) {
    return output.slice(baseline.length);
  }

  const baselineLines = baseline.split('\n');
  for (let start = 1; start < baselineLines.length; start += 1) {
    const overlap = baselineLines.slice(start).join('\n');
    if (overlap.trim() && output.startsWith(overlap)) {
      return output.slice(overlap.length);
    }
  }

  const anchors = baselineLines.filter((line) => line.trim().length > 0);
  const anchor = anchors[anchors.length - 1];
  if (anchor) {
    const index = output.indexOf(anchor);
    if (index >= 0) {
      return output.slice(index + anchor.length);
    }
  }

  return output;
}

/**
 * Portion of `output` after the pane's echo of the typed `command`, so the
 * command's own text is never read back as the agent's answer. Whitespace is
 * ignored while matching because panes wrap long lines. Returns `output`
 * unchanged when the echo is not on screen.
 */
export function outputAfterCommandEcho(output: string, command: string): string {
  const needle = command.replace(/\s+/g, '');
  if (!needle) {
    return output;
  }

  let compact = '';
  const offsets: number[] = [];
  for (let index = 0; index < output.length; index += 1) {
    const char = output[index];
    if (/\s/.test(char)) continue;
    compact += char;
    offsets.push(index);
  }

  const start = compact.indexOf(needle);
  if (start < 0) {
    return output;
  }
  return output.slice(offsets[start + needle.length - 1] + 1);
}
