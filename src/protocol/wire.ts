/**
 * Line framing. A protocol line is the sentinel, the message name and the
 * hex-encoded arguments, separated by single spaces. Any other line is
 * passthrough text.
 */
export const SENTINEL = '<<--TESTRELAY-->>:';

export interface Frame {
  name: string;
  args: string[];
}

export function formatFrame(name: string, encodedArgs: string[]): string {
  return [SENTINEL, name, ...encodedArgs].join(' ');
}

export function isFrame(line: string): boolean {
  return line.startsWith(SENTINEL);
}

export function parseFrame(line: string): Frame | null {
  if (!isFrame(line)) {
    return null;
  }
  const [name = '', ...args] = line.slice(SENTINEL.length).trim().split(/\s+/);
  return { name, args: args.filter(Boolean) };
}
