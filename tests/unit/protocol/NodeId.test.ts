import { describe, it, expect } from 'vitest';
import { NodeId } from '../../../src/protocol/NodeId';

describe('NodeId', () => {
  it('splits a test id into file, scope and name', () => {
    const id = new NodeId('tests/math.test.ts::arithmetic::adds numbers');

    expect(id.filePath).toBe('tests/math.test.ts');
    expect(id.scope).toEqual(['arithmetic']);
    expect(id.name).toBe('adds numbers');
    expect(id.directory).toBe('tests');
    expect(id.fullName).toBe('arithmetic adds numbers');
    expect(id.parts).toEqual(['tests', 'math.test.ts', 'arithmetic', 'adds numbers']);
  });

  it('names a file-level id after its last path component', () => {
    const id = new NodeId('tests/math.test.ts');

    expect(id.name).toBe('math.test.ts');
    expect(id.scope).toEqual([]);
    expect(id.parts).toEqual(['tests', 'math.test.ts']);
  });

  it('uses . as the directory of a file at the root', () => {
    expect(new NodeId('root.test.ts::works').directory).toBe('.');
  });

  it('makes an absolute file path inside the root relative', () => {
    const id = new NodeId('/repo/tests/math.test.ts::adds', '/repo');

    expect(id.filePath).toBe('tests/math.test.ts');
    expect(id.absolutePath).toBe('/repo/tests/math.test.ts');
  });

  it('keeps an absolute file path outside the root', () => {
    const id = new NodeId('/elsewhere/math.test.ts::adds', '/repo');

    expect(id.filePath).toBe('/elsewhere/math.test.ts');
  });

  it('compares and serializes by value', () => {
    const id = new NodeId('a.test.ts::one');

    expect(id.equals(new NodeId('a.test.ts::one', '/repo'))).toBe(true);
    expect(id.equals(new NodeId('a.test.ts::two'))).toBe(false);
    expect(String(id)).toBe('a.test.ts::one');
    expect(JSON.stringify({ id })).toBe('{"id":"a.test.ts::one"}');
    expect(id.withRoot('/repo').rootPath).toBe('/repo');
  });
});
