/**
 * MTLParser - MTL material library parser
 * Turns MTL commands into Material records, in file order
 */

import { StringSource, type CharSource } from '../core/CharSource';
import { resolveLoaderOptions, type LoaderOptions, type LoaderOptionsInput } from '../core/config';
import { LoaderError } from '../core/LoaderError';
import { Tokenizer } from '../core/Tokenizer';
import { createDefaultMaterial, type Color, type Material } from '../types';

/**
 * MTL text parser
 */
export class MTLParser {
  private readonly options: LoaderOptions;

  private materials: Material[] = [];
  private currentMaterial: Material | null = null;

  // directives already warned about, so each is reported once per parse
  private warnedDirectives: Set<string> = new Set();

  constructor(options: LoaderOptionsInput = {}) {
    this.options = resolveLoaderOptions(options);
  }

  /**
   * Parses MTL text
   * @throws LoaderError on a malformed property or a property before the first newmtl
   */
  parse(text: string): Material[] {
    return this.parseSource(new StringSource(text));
  }

  /**
   * Parses MTL commands from a character source until it is exhausted
   */
  parseSource(source: CharSource): Material[] {
    this.reset();
    const tokenizer = new Tokenizer(source, this.options);

    try {
      for (;;) {
        const token = tokenizer.next();
        if (token.text === '') {
          if (token.end === 'eof') {
            break;
          }
          continue;
        }
        this.parseCommand(token.text, tokenizer);
      }

      const materials = this.materials;
      if (this.options.debug) {
        console.log(`MTLParser: ${materials.length} materials`);
      }
      return materials;
    } finally {
      this.reset();
    }
  }

  private reset(): void {
    this.materials = [];
    this.currentMaterial = null;
    this.warnedDirectives = new Set();
  }

  /**
   * Warns about an unsupported directive, only on its first occurrence
   */
  private warnUnsupportedDirective(directive: string, lineNum: number): void {
    if (!this.warnedDirectives.has(directive)) {
      this.warnedDirectives.add(directive);
      console.warn(`MTLParser: unsupported directive "${directive}" at line ${lineNum}, ignored`);
    }
  }

  private parseCommand(command: string, tokenizer: Tokenizer): void {
    if (command.startsWith('#')) {
      tokenizer.skipLine();
      return;
    }

    switch (command) {
      case 'illum':
      case 'Tf':
        tokenizer.skipLine();
        break;
      case 'newmtl':
        this.parseNewMaterial(tokenizer);
        break;
      case 'Ka':
        this.requireMaterial(command, tokenizer).ambientColor = readColor(tokenizer, command);
        break;
      case 'Kd':
        this.requireMaterial(command, tokenizer).diffuseColor = readColor(tokenizer, command);
        break;
      case 'Ks':
        this.requireMaterial(command, tokenizer).specularColor = readColor(tokenizer, command);
        break;
      case 'd':
        this.requireMaterial(command, tokenizer).opacity = readScalar(tokenizer, command);
        break;
      case 'Tr':
        // transparency, the inverse of d
        this.requireMaterial(command, tokenizer).opacity = 1 - readScalar(tokenizer, command);
        break;
      case 'Ns':
        this.requireMaterial(command, tokenizer).specularExponent = readScalar(tokenizer, command);
        break;
      case 'Ni':
        this.requireMaterial(command, tokenizer).refractionIndex = readScalar(tokenizer, command);
        break;
      case 'map_Ka':
        this.requireMaterial(command, tokenizer).ambientMapPath = tokenizer.restOfLine();
        break;
      case 'map_Kd':
        this.requireMaterial(command, tokenizer).diffuseMapPath = tokenizer.restOfLine();
        break;
      case 'map_Ks':
        this.requireMaterial(command, tokenizer).specularMapPath = tokenizer.restOfLine();
        break;
      case 'map_Bump':
      case 'map_bump':
      case 'bump':
        this.requireMaterial(command, tokenizer).normalMapPath = tokenizer.restOfLine();
        break;
      default:
        this.warnUnsupportedDirective(command, tokenizer.line);
        tokenizer.skipLine();
        break;
    }
  }

  /**
   * Starts a new material (newmtl name); the name may contain spaces
   */
  private parseNewMaterial(tokenizer: Tokenizer): void {
    const material = createDefaultMaterial(tokenizer.restOfLine());
    this.materials.push(material);
    this.currentMaterial = material;
  }

  private requireMaterial(command: string, tokenizer: Tokenizer): Material {
    if (this.currentMaterial === null) {
      throw new LoaderError('invalid-file', `"${command}" before any newmtl`, { line: tokenizer.line });
    }
    return this.currentMaterial;
  }
}

function readScalar(tokenizer: Tokenizer, command: string): number {
  const line = tokenizer.line;
  const token = tokenizer.nextFieldOnLine();
  if (token === null) {
    throw new LoaderError('invalid-file', `"${command}" needs a value`, { line });
  }

  const value = Number(token);
  if (!Number.isFinite(value)) {
    throw new LoaderError('invalid-file', `invalid value "${token}" for "${command}"`, { line });
  }
  tokenizer.skipLine();
  return value;
}

function readColor(tokenizer: Tokenizer, command: string): Color {
  const line = tokenizer.line;
  const channels: number[] = [];

  for (let i = 0; i < 3; i++) {
    const token = tokenizer.nextFieldOnLine();
    const value = token === null ? NaN : Number(token);
    if (!Number.isFinite(value)) {
      throw new LoaderError('invalid-file', `"${command}" needs 3 color channels`, { line });
    }
    channels.push(value);
  }
  tokenizer.skipLine();

  return { r: channels[0], g: channels[1], b: channels[2] };
}
