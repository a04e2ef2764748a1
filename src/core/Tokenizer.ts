/**
 * Tokenizer - whitespace-delimited tokens over a CharSource
 *
 * Both the OBJ and MTL parsers are driven by it: a command is the first token of a
 * line, its payload is read either token by token (nextOnLine) or as one trimmed
 * string (restOfLine).
 */

import type { CharSource } from './CharSource';
import { LoaderError } from './LoaderError';

/**
 * What terminated a token
 */
export type TokenEnd = 'space' | 'newline' | 'eof';

export interface Token {
  /** empty when no characters were read before the terminator */
  text: string;
  end: TokenEnd;
}

export interface TokenizerOptions {
  maxTokenLength: number;
  /** treat an over-long token as invalid-file instead of truncating it */
  strictTokenLength: boolean;
}

const SPACE_CHARS = new Set([' ', '\t', '\r', '\v', '\f']);

export class Tokenizer {
  private readonly maxTokenLength: number;
  private readonly strictTokenLength: boolean;

  // a character read past a truncated token, handed out before the source
  private pushedBack: string | null = null;
  private lastEnd: TokenEnd = 'newline';
  private lastTruncated = false;
  private nextLine = 1;
  private tokenLine = 1;

  constructor(
    private readonly source: CharSource,
    options: TokenizerOptions
  ) {
    this.maxTokenLength = options.maxTokenLength;
    this.strictTokenLength = options.strictTokenLength;
  }

  /** 1-based line of the most recent token */
  get line(): number {
    return this.tokenLine;
  }

  /** true when the most recent token was cut at maxTokenLength */
  get truncated(): boolean {
    return this.lastTruncated;
  }

  /** true once the current line has been fully consumed */
  get atLineEnd(): boolean {
    return this.lastEnd !== 'space';
  }

  /**
   * Reads the next token. A token longer than maxTokenLength is cut there and the
   * rest of it comes back as the following token.
   */
  next(): Token {
    this.tokenLine = this.nextLine;
    this.lastTruncated = false;
    let text = '';

    for (;;) {
      const ch = this.readChar();

      if (ch === null) {
        return this.finish(text, 'eof');
      }
      if (ch === '\n') {
        this.nextLine++;
        return this.finish(text, 'newline');
      }
      if (SPACE_CHARS.has(ch)) {
        return this.finish(text, 'space');
      }

      if (text.length >= this.maxTokenLength) {
        if (this.strictTokenLength) {
          throw this.tokenTooLong();
        }
        this.pushedBack = ch;
        this.lastTruncated = true;
        return this.finish(text, 'space');
      }

      text += ch;
    }
  }

  /**
   * Next non-empty token on the current line, or null once the line has ended
   */
  nextOnLine(): string | null {
    while (this.lastEnd === 'space') {
      const token = this.next();
      if (token.text !== '') {
        return token.text;
      }
    }
    return null;
  }

  /**
   * Next token of a numeric field or face reference on the current line. A cut token
   * is invalid-file here, since its remainder would be read as the following field.
   */
  nextFieldOnLine(): string | null {
    const token = this.nextOnLine();
    if (token !== null && this.lastTruncated) {
      throw this.tokenTooLong();
    }
    return token;
  }

  /**
   * Reads the remainder of the current line, trimmed. Empty when the line already ended.
   */
  restOfLine(): string {
    if (this.lastEnd !== 'space') {
      return '';
    }

    let rest = '';
    for (;;) {
      const ch = this.readChar();
      if (ch === null) {
        this.lastEnd = 'eof';
        break;
      }
      if (ch === '\n') {
        this.nextLine++;
        this.lastEnd = 'newline';
        break;
      }
      rest += ch;
    }
    return rest.trim();
  }

  /**
   * Discards the remainder of the current line
   */
  skipLine(): void {
    while (this.lastEnd === 'space') {
      const ch = this.readChar();
      if (ch === null) {
        this.lastEnd = 'eof';
      } else if (ch === '\n') {
        this.nextLine++;
        this.lastEnd = 'newline';
      }
    }
  }

  private readChar(): string | null {
    if (this.pushedBack !== null) {
      const ch = this.pushedBack;
      this.pushedBack = null;
      return ch;
    }
    return this.source.read();
  }

  private tokenTooLong(): LoaderError {
    return new LoaderError('invalid-file', `token exceeds ${this.maxTokenLength} characters`, {
      line: this.tokenLine,
    });
  }

  private finish(text: string, end: TokenEnd): Token {
    this.lastEnd = end;
    return { text, end };
  }
}
