/**
 * Output rendering helpers
 */

type Color = "red" | "green" | "yellow";

/** Anything lines can be written to; process.stdout and process.stderr qualify */
export interface Output {
  write(chunk: string): unknown;
  isTTY?: boolean;
}

export function printJson(out: Output, data: unknown, options?: { raw?: boolean }): void {
  const json = options?.raw ? JSON.stringify(data) : JSON.stringify(data, null, 2);
  out.write(`${json}\n`);
}

export function printText(out: Output, text: string): void {
  out.write(text.endsWith("\n") ? text : `${text}\n`);
}

/**
 * Apply ANSI color only if the stream is a TTY
 */
export function colorize(text: string, color: Color, stream: Output): string {
  if (!(stream.isTTY ?? false)) {
    return text;
  }

  const codes: Record<Color, string> = {
    red: "\x1b[31m",
    green: "\x1b[32m",
    yellow: "\x1b[33m",
  };

  const reset = "\x1b[0m";
  return `${codes[color]}${text}${reset}`;
}
