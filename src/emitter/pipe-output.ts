import type { Writable } from 'stream';

export interface PipeOutput {
  /** Stream used for state checks and drain events */
  readonly stream: Writable;
  /** The stream's own write, captured before any redirection */
  readonly write: (data: string) => boolean;
}

/**
 * Capture the real write function of `stream` so frames still reach it after
 * `captureStdio` has replaced `stream.write`. Call before capturing.
 */
export function claimOutput(stream: Writable = process.stdout): PipeOutput {
  const original = stream.write.bind(stream);
  return {
    stream,
    write: (data: string) => original(data)
  };
}
