import type { Writable } from 'stream';

export type CapturedStream = 'stdout' | 'stderr';

export interface StdioCapture {
  restore(): void;
}

export interface CaptureTargets {
  stdout: Writable;
  stderr: Writable;
}

type WriteCallback = (error?: Error | null) => void;

/**
 * Route everything written to stdout and stderr into `sink` instead of the
 * underlying streams. Text written while captured never reaches the file
 * descriptors, so it cannot interleave with protocol frames.
 */
export function captureStdio(
  sink: (stream: CapturedStream, text: string) => void,
  targets: CaptureTargets = { stdout: process.stdout, stderr: process.stderr }
): StdioCapture {
  const patched: Array<{ stream: Writable; previous: Writable['write'] }> = [];

  for (const name of ['stdout', 'stderr'] as const) {
    const stream = targets[name];
    patched.push({ stream, previous: stream.write });

    stream.write = (
      chunk: Uint8Array | string,
      encodingOrCallback?: BufferEncoding | WriteCallback,
      callback?: WriteCallback
    ): boolean => {
      const encoding = typeof encodingOrCallback === 'string' ? encodingOrCallback : undefined;
      const text = typeof chunk === 'string'
        ? chunk
        : Buffer.from(chunk.buffer, chunk.byteOffset, chunk.byteLength).toString(encoding ?? 'utf8');
      if (text.length > 0) {
        sink(name, text);
      }
      const done = typeof encodingOrCallback === 'function' ? encodingOrCallback : callback;
      if (done) {
        process.nextTick(done);
      }
      return true;
    };
  }

  let restored = false;
  return {
    restore(): void {
      if (restored) return;
      restored = true;
      for (const { stream, previous } of patched) {
        stream.write = previous;
      }
    }
  };
}
