import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, it, expect, afterEach } from 'vitest';
import { FileSource, StringSource, type CharSource } from './CharSource';
import { LoaderError } from './LoaderError';
import { Tokenizer, type Token } from './Tokenizer';

function tokenize(text: string, maxTokenLength = 128): Tokenizer {
  return new Tokenizer(new StringSource(text), { maxTokenLength, strictTokenLength: false });
}

function allTokens(tokenizer: Tokenizer): Token[] {
  const tokens: Token[] = [];
  for (;;) {
    const token = tokenizer.next();
    tokens.push(token);
    if (token.end === 'eof') {
      return tokens;
    }
  }
}

function readAll(source: CharSource): string {
  let text = '';
  for (let ch = source.read(); ch !== null; ch = source.read()) {
    text += ch;
  }
  return text;
}

describe('Tokenizer', () => {
  it('should report what ended each token', () => {
    const tokens = allTokens(tokenize('v 1 2\nf 3'));

    expect(tokens).toEqual([
      { text: 'v', end: 'space' },
      { text: '1', end: 'space' },
      { text: '2', end: 'newline' },
      { text: 'f', end: 'space' },
      { text: '3', end: 'eof' },
    ]);
  });

  it('should treat tabs and carriage returns as spaces', () => {
    const tokens = allTokens(tokenize('a\tb\r\n'));

    expect(tokens.map((t) => t.text)).toEqual(['a', 'b', '', '']);
    expect(tokens.map((t) => t.end)).toEqual(['space', 'space', 'newline', 'eof']);
  });

  it('should keep returning eof once the input is exhausted', () => {
    const tokenizer = tokenize('');

    expect(tokenizer.next()).toEqual({ text: '', end: 'eof' });
    expect(tokenizer.next()).toEqual({ text: '', end: 'eof' });
  });

  it('should track the line of the most recent token', () => {
    const tokenizer = tokenize('a\n\nb c\n');

    tokenizer.next();
    expect(tokenizer.line).toBe(1);
    tokenizer.next();
    expect(tokenizer.line).toBe(2);
    tokenizer.next();
    expect(tokenizer.line).toBe(3);
    tokenizer.next();
    expect(tokenizer.line).toBe(3);
  });

  describe('nextOnLine', () => {
    it('should skip repeated spaces and stop at the end of the line', () => {
      const tokenizer = tokenize('a b  c\nd');

      expect(tokenizer.next().text).toBe('a');
      expect(tokenizer.nextOnLine()).toBe('b');
      expect(tokenizer.nextOnLine()).toBe('c');
      expect(tokenizer.atLineEnd).toBe(true);
      expect(tokenizer.nextOnLine()).toBeNull();
      expect(tokenizer.next()).toEqual({ text: 'd', end: 'eof' });
    });

    it('should ignore trailing whitespace', () => {
      const tokenizer = tokenize('a b \t\r\nc');

      tokenizer.next();
      expect(tokenizer.nextOnLine()).toBe('b');
      expect(tokenizer.nextOnLine()).toBeNull();
      expect(tokenizer.next().text).toBe('c');
    });
  });

  describe('restOfLine', () => {
    it('should return the trimmed remainder including inner spaces', () => {
      const tokenizer = tokenize('usemtl  Red Metal \r\nf');

      expect(tokenizer.next().text).toBe('usemtl');
      expect(tokenizer.restOfLine()).toBe('Red Metal');
      expect(tokenizer.next()).toEqual({ text: 'f', end: 'eof' });
      expect(tokenizer.line).toBe(2);
    });

    it('should return an empty string when the line already ended', () => {
      const tokenizer = tokenize('newmtl\nx');

      tokenizer.next();
      expect(tokenizer.restOfLine()).toBe('');
      expect(tokenizer.next().text).toBe('x');
    });

    it('should stop at the end of input', () => {
      const tokenizer = tokenize('mtllib a b.mtl');

      tokenizer.next();
      expect(tokenizer.restOfLine()).toBe('a b.mtl');
      expect(tokenizer.next()).toEqual({ text: '', end: 'eof' });
    });
  });

  it('should discard the rest of a line with skipLine', () => {
    const tokenizer = tokenize('# a comment line\nv');

    expect(tokenizer.next().text).toBe('#');
    tokenizer.skipLine();
    expect(tokenizer.next()).toEqual({ text: 'v', end: 'eof' });
    expect(tokenizer.line).toBe(2);
  });

  describe('token length', () => {
    it('should flag only the cut part of an over-long token', () => {
      const tokenizer = tokenize('abcdef gh', 4);

      expect(tokenizer.next().text).toBe('abcd');
      expect(tokenizer.truncated).toBe(true);
      expect(tokenizer.next().text).toBe('ef');
      expect(tokenizer.truncated).toBe(false);
    });

    it('should reject a cut field read with nextFieldOnLine', () => {
      const tokenizer = tokenize('v ab abcdef', 4);

      tokenizer.next();
      expect(tokenizer.nextFieldOnLine()).toBe('ab');
      expect(() => tokenizer.nextFieldOnLine()).toThrow('token exceeds 4 characters (line 1)');
    });

    it('should split an over-long token at the limit', () => {
      const tokens = allTokens(tokenize('abcdef gh', 4));

      expect(tokens.map((t) => t.text)).toEqual(['abcd', 'ef', 'gh']);
    });

    it('should accept a token of exactly the limit', () => {
      const tokens = allTokens(tokenize('abcd', 4));

      expect(tokens).toEqual([{ text: 'abcd', end: 'eof' }]);
    });

    it('should reject an over-long token in strict mode', () => {
      const tokenizer = new Tokenizer(new StringSource('abcd efgh\nabcde'), {
        maxTokenLength: 4,
        strictTokenLength: true,
      });

      expect(tokenizer.next().text).toBe('abcd');
      expect(tokenizer.next().text).toBe('efgh');

      let caught: unknown;
      try {
        tokenizer.next();
      } catch (error) {
        caught = error;
      }
      expect(caught).toBeInstanceOf(LoaderError);
      expect(caught).toMatchObject({ kind: 'invalid-file', line: 2 });
    });
  });
});

describe('FileSource', () => {
  let dir: string | null = null;

  afterEach(() => {
    if (dir !== null) {
      rmSync(dir, { recursive: true, force: true });
      dir = null;
    }
  });

  it('should decode characters split across chunks', () => {
    dir = mkdtempSync(join(tmpdir(), 'char-source-'));
    const path = join(dir, 'name.mtl');
    writeFileSync(path, 'usemtl café\n');

    const source = FileSource.open(path, 3);
    try {
      expect(readAll(source)).toBe('usemtl café\n');
      expect(source.read()).toBeNull();
    } finally {
      source.close();
    }
  });

  it('should allow close to be called twice', () => {
    dir = mkdtempSync(join(tmpdir(), 'char-source-'));
    const path = join(dir, 'empty.obj');
    writeFileSync(path, '');

    const source = FileSource.open(path, 16);
    expect(source.read()).toBeNull();
    source.close();
    expect(() => source.close()).not.toThrow();
  });

  it('should drop a leading byte order mark even when it spans chunks', () => {
    dir = mkdtempSync(join(tmpdir(), 'char-source-'));
    const path = join(dir, 'bom.obj');
    writeFileSync(path, '\uFEFFv 1 2 3\n');

    const source = FileSource.open(path, 1);
    try {
      expect(readAll(source)).toBe('v 1 2 3\n');
    } finally {
      source.close();
    }
  });

  it('should fail with io when the file cannot be opened', () => {
    const path = join(tmpdir(), 'obj-loader-does-not-exist', 'missing.obj');

    expect(() => FileSource.open(path, 16)).toThrow(LoaderError);
    expect(() => FileSource.open(path, 16)).toThrow(`cannot open ${path}`);
  });
});

describe('StringSource', () => {
  it('should skip a leading byte order mark', () => {
    expect(readAll(new StringSource('\uFEFFab'))).toBe('ab');
  });

  it('should keep a byte order mark that is not at the start', () => {
    expect(readAll(new StringSource('a\uFEFF'))).toBe('a\uFEFF');
  });

  it('should yield every character and then null', () => {
    const source = new StringSource('ab');

    expect(readAll(source)).toBe('ab');
    expect(source.read()).toBeNull();
  });
});
