import { describe, it, expect } from 'vitest';
import { formatFrame, isFrame, parseFrame, SENTINEL } from '../../../src/protocol/wire';

describe('wire framing', () => {
  it('joins sentinel, name and arguments with single spaces', () => {
    expect(formatFrame('copyStdout', ['a1', 'b2'])).toBe('<<--TESTRELAY-->>: copyStdout a1 b2');
    expect(formatFrame('unconfigure', [])).toBe('<<--TESTRELAY-->>: unconfigure');
  });

  it('parses a frame back into name and arguments', () => {
    expect(parseFrame(`${SENTINEL} copyStdout a1 b2`)).toEqual({ name: 'copyStdout', args: ['a1', 'b2'] });
    expect(parseFrame(`${SENTINEL} unconfigure`)).toEqual({ name: 'unconfigure', args: [] });
  });

  it('tolerates repeated whitespace between tokens', () => {
    expect(parseFrame(`${SENTINEL}  endTest   ff `)).toEqual({ name: 'endTest', args: ['ff'] });
  });

  it('treats any other line as passthrough', () => {
    expect(isFrame('PASS tests/a.test.ts')).toBe(false);
    expect(parseFrame('PASS tests/a.test.ts')).toBeNull();
    expect(parseFrame(` ${SENTINEL} init`)).toBeNull();
  });
});
