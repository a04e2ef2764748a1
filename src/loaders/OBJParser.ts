/**
 * OBJParser - OBJ mesh assembler
 * Turns OBJ commands into welded, triangulated meshes, one per material and vertex layout
 */

import { StringSource, type CharSource } from '../core/CharSource';
import { resolveLoaderOptions, type LoaderOptions, type LoaderOptionsInput } from '../core/config';
import { GrowableBuffer } from '../core/GrowableBuffer';
import { LoaderError } from '../core/LoaderError';
import { Tokenizer } from '../core/Tokenizer';
import { createVertexHashMap, type VertexHashMap, type VertexRef } from '../core/VertexHashMap';
import {
  NORMAL_SIZE,
  POSITION_SIZE,
  TEX_COORD_SIZE,
  VertexAttribute,
  VertexSpecification,
  computeVertexLayout,
  type Mesh,
  type VertexLayout,
} from '../types';

/**
 * Result of parsing one OBJ stream
 */
export interface ParsedOBJData {
  meshes: Mesh[];
  /** `mtllib` references in file order */
  materialLibraries: string[];
}

/**
 * A mesh while it is being assembled
 */
interface MeshBuilder {
  material: string;
  attributes: VertexSpecification;
  layout: VertexLayout;
  vertices: GrowableBuffer<Float32Array>;
  indices: GrowableBuffer<Uint32Array>;
  vertexMap: VertexHashMap;
  numVertices: number;
}

const INDEX_PATTERN = /^-?\d+$/;

/**
 * OBJ text parser
 */
export class OBJParser {
  private readonly options: LoaderOptions;

  // raw attribute pools, 3/3/2 floats per record
  private positions: GrowableBuffer<Float32Array>;
  private normals: GrowableBuffer<Float32Array>;
  private texCoords: GrowableBuffer<Float32Array>;

  private builders: MeshBuilder[] = [];
  private currentMesh: MeshBuilder | null = null;
  private currentMaterial = '';
  private materialLibraries: string[] = [];

  constructor(options: LoaderOptionsInput = {}) {
    this.options = resolveLoaderOptions(options);
    this.positions = this.createAttributeBuffer(POSITION_SIZE);
    this.normals = this.createAttributeBuffer(NORMAL_SIZE);
    this.texCoords = this.createAttributeBuffer(TEX_COORD_SIZE);
  }

  /**
   * Parses OBJ text
   * @throws LoaderError on the first malformed or unsupported command
   */
  parse(text: string): ParsedOBJData {
    return this.parseSource(new StringSource(text));
  }

  /**
   * Parses OBJ commands from a character source until it is exhausted
   * @throws LoaderError on the first malformed or unsupported command
   */
  parseSource(source: CharSource): ParsedOBJData {
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

      const meshes = this.builders.map((builder) => this.finalizeMesh(builder));
      const materialLibraries = this.materialLibraries;

      if (this.options.debug) {
        console.log(
          `OBJParser: ${meshes.length} meshes from ${this.positions.length / POSITION_SIZE} positions, ` +
            `${this.normals.length / NORMAL_SIZE} normals, ${this.texCoords.length / TEX_COORD_SIZE} tex coords`
        );
      }

      return { meshes, materialLibraries };
    } finally {
      // scratch pools and vertex maps never outlive the call
      this.reset();
    }
  }

  private reset(): void {
    this.positions = this.createAttributeBuffer(POSITION_SIZE);
    this.normals = this.createAttributeBuffer(NORMAL_SIZE);
    this.texCoords = this.createAttributeBuffer(TEX_COORD_SIZE);
    this.builders = [];
    this.currentMesh = null;
    this.currentMaterial = '';
    this.materialLibraries = [];
  }

  private createAttributeBuffer(recordSize: number): GrowableBuffer<Float32Array> {
    return GrowableBuffer.float32({
      initialCapacity: this.options.initialCapacity * recordSize,
      maxCapacity: this.options.maxBufferElements,
    });
  }

  private parseCommand(command: string, tokenizer: Tokenizer): void {
    if (command.startsWith('#')) {
      tokenizer.skipLine();
      return;
    }

    switch (command) {
      case 'o':
      case 'g':
      case 's':
        tokenizer.skipLine();
        break;
      case 'mtllib': {
        const library = tokenizer.restOfLine();
        if (library !== '') {
          this.materialLibraries.push(library);
        }
        break;
      }
      case 'v':
        this.parseAttribute(tokenizer, this.positions, POSITION_SIZE, 'position');
        break;
      case 'vn':
        this.parseAttribute(tokenizer, this.normals, NORMAL_SIZE, 'normal');
        break;
      case 'vt':
        this.parseAttribute(tokenizer, this.texCoords, TEX_COORD_SIZE, 'texture coordinate');
        break;
      case 'usemtl':
        this.currentMaterial = tokenizer.restOfLine();
        this.currentMesh = null;
        break;
      case 'f':
        this.parseFace(tokenizer);
        break;
      default:
        throw new LoaderError('unsupported-command', `unsupported command "${command}"`, {
          line: tokenizer.line,
        });
    }
  }

  /**
   * Reads one v / vn / vt record. Components past `size` (a w, vertex colors) are dropped.
   */
  private parseAttribute(
    tokenizer: Tokenizer,
    buffer: GrowableBuffer<Float32Array>,
    size: number,
    name: string
  ): void {
    const line = tokenizer.line;
    const start = buffer.extend(size);

    for (let i = 0; i < size; i++) {
      const token = tokenizer.nextFieldOnLine();
      if (token === null) {
        throw new LoaderError('invalid-file', `${name} needs ${size} components`, { line });
      }
      buffer.set(start + i, parseNumber(token, line));
    }

    tokenizer.skipLine();
  }

  /**
   * Parses a face (f v1 v2 v3 ...) and fan-triangulates it:
   * (v0, v1, v2), (v0, v2, v3), ..., (v0, vn-2, vn-1)
   */
  private parseFace(tokenizer: Tokenizer): void {
    const line = tokenizer.line;

    const firstToken = tokenizer.nextFieldOnLine();
    if (firstToken === null) {
      throw new LoaderError('invalid-file', 'face has no vertices', { line });
    }
    const first = parseVertexRef(firstToken, line);
    const mesh = this.resolveMesh(first.spec);

    const readNext = (): VertexRef | null => {
      const token = tokenizer.nextOnLine();
      if (token === null) {
        return null;
      }
      if (token.startsWith('#')) {
        // trailing comment ends the face
        tokenizer.skipLine();
        return null;
      }
      if (tokenizer.truncated) {
        throw new LoaderError('invalid-file', `token exceeds ${this.options.maxTokenLength} characters`, {
          line,
        });
      }
      const next = parseVertexRef(token, line);
      if (next.spec !== first.spec) {
        throw new LoaderError('invalid-file', `face vertex "${token}" does not match "${firstToken}"`, {
          line,
        });
      }
      return next.ref;
    };

    let v1 = readNext();
    let v2 = readNext();
    if (v1 === null || v2 === null) {
      throw new LoaderError('invalid-file', 'face needs at least 3 vertices', { line });
    }

    for (;;) {
      this.addTriangle(mesh, first.ref, v1, v2, line);

      const next = readNext();
      if (next === null) {
        break;
      }
      v1 = v2;
      v2 = next;
    }
  }

  /**
   * Mesh for the current material and the face's layout, created on first use.
   * Meshes merge by material across the whole file, never across layouts.
   */
  private resolveMesh(spec: VertexSpecification): MeshBuilder {
    if (this.currentMesh !== null && this.currentMesh.attributes === spec) {
      return this.currentMesh;
    }

    const existing = this.builders.find(
      (builder) => builder.material === this.currentMaterial && builder.attributes === spec
    );
    const mesh = existing ?? this.createMesh(spec);
    this.currentMesh = mesh;
    return mesh;
  }

  private createMesh(spec: VertexSpecification): MeshBuilder {
    const layout = computeVertexLayout(spec);
    const { initialCapacity, maxBufferElements } = this.options;

    const builder: MeshBuilder = {
      material: this.currentMaterial,
      attributes: spec,
      layout,
      vertices: GrowableBuffer.float32({
        initialCapacity: initialCapacity * layout.vertexStride,
        maxCapacity: maxBufferElements,
      }),
      indices: GrowableBuffer.uint32({ initialCapacity, maxCapacity: maxBufferElements }),
      vertexMap: createVertexHashMap(initialCapacity),
      numVertices: 0,
    };
    this.builders.push(builder);
    return builder;
  }

  private addTriangle(mesh: MeshBuilder, v0: VertexRef, v1: VertexRef, v2: VertexRef, line: number): void {
    mesh.indices.reserve(3);
    mesh.vertices.reserve(3 * mesh.layout.vertexStride);

    for (const ref of [v0, v1, v2]) {
      const key = this.resolveRef(ref, mesh.attributes, line);
      const index = mesh.vertexMap.getOrAdd(key, () => this.appendVertex(mesh, key));
      mesh.indices.push(index);
    }
  }

  /**
   * Turns relative indices absolute and checks them against the pools.
   * Fields the mesh does not use are zeroed so they never split a weld.
   */
  private resolveRef(ref: VertexRef, attributes: number, line: number): VertexRef {
    const resolved: VertexRef = { position: 0, normal: 0, texCoord: 0 };

    if (attributes & VertexAttribute.Position) {
      resolved.position = resolveIndex(ref.position, this.positions.length / POSITION_SIZE, 'position', line);
    }
    if (attributes & VertexAttribute.Normal) {
      resolved.normal = resolveIndex(ref.normal, this.normals.length / NORMAL_SIZE, 'normal', line);
    }
    if (attributes & VertexAttribute.TexCoord) {
      resolved.texCoord = resolveIndex(
        ref.texCoord,
        this.texCoords.length / TEX_COORD_SIZE,
        'texture coordinate',
        line
      );
    }

    return resolved;
  }

  /**
   * Copies the referenced attributes into the mesh's interleaved buffer
   * @returns the new vertex's index
   */
  private appendVertex(mesh: MeshBuilder, ref: VertexRef): number {
    const { positionOffset, normalOffset, texCoordOffset, vertexStride } = mesh.layout;
    const base = mesh.vertices.extend(vertexStride);

    if (positionOffset !== null) {
      copyRecord(this.positions, (ref.position - 1) * POSITION_SIZE, mesh.vertices, base + positionOffset, POSITION_SIZE);
    }
    if (normalOffset !== null) {
      copyRecord(this.normals, (ref.normal - 1) * NORMAL_SIZE, mesh.vertices, base + normalOffset, NORMAL_SIZE);
    }
    if (texCoordOffset !== null) {
      copyRecord(this.texCoords, (ref.texCoord - 1) * TEX_COORD_SIZE, mesh.vertices, base + texCoordOffset, TEX_COORD_SIZE);
    }

    return mesh.numVertices++;
  }

  private finalizeMesh(builder: MeshBuilder): Mesh {
    return {
      attributes: builder.attributes,
      ...builder.layout,
      numVertices: builder.numVertices,
      vertices: builder.vertices.toArray(),
      numIndices: builder.indices.length,
      indices: builder.indices.toArray(),
      material: builder.material,
    };
  }
}

/**
 * Parses a face vertex reference: v, v/vt, v//vn or v/vt/vn
 */
export function parseVertexRef(token: string, line?: number): { ref: VertexRef; spec: VertexSpecification } {
  const parts = token.split('/');
  const invalid = () => new LoaderError('invalid-file', `invalid face vertex "${token}"`, { line });

  if (parts.length > 3 || !INDEX_PATTERN.test(parts[0])) {
    throw invalid();
  }
  const ref: VertexRef = { position: parseInt(parts[0], 10), normal: 0, texCoord: 0 };

  if (parts.length === 1) {
    return { ref, spec: VertexSpecification.Position };
  }

  const hasTexCoord = parts[1] !== '';
  const hasNormal = parts.length === 3;

  if (hasTexCoord) {
    if (!INDEX_PATTERN.test(parts[1])) {
      throw invalid();
    }
    ref.texCoord = parseInt(parts[1], 10);
  }
  if (hasNormal) {
    if (!INDEX_PATTERN.test(parts[2])) {
      throw invalid();
    }
    ref.normal = parseInt(parts[2], 10);
  }

  if (hasTexCoord && hasNormal) {
    return { ref, spec: VertexSpecification.PositionTexCoordNormal };
  }
  if (hasTexCoord) {
    return { ref, spec: VertexSpecification.PositionTexCoord };
  }
  if (hasNormal) {
    return { ref, spec: VertexSpecification.PositionNormal };
  }
  // "1/" names no second field
  throw invalid();
}

/**
 * Makes a 1-based or negative (relative to the end) index absolute
 * @throws LoaderError when the result is outside [1, count]
 */
export function resolveIndex(index: number, count: number, name: string, line?: number): number {
  const resolved = index < 0 ? index + count + 1 : index;
  if (resolved < 1 || resolved > count) {
    throw new LoaderError('invalid-file', `${name} index ${index} out of range (1..${count})`, { line });
  }
  return resolved;
}

function parseNumber(token: string, line: number): number {
  const value = Number(token);
  if (!Number.isFinite(value)) {
    throw new LoaderError('invalid-file', `invalid number "${token}"`, { line });
  }
  return value;
}

function copyRecord(
  from: GrowableBuffer<Float32Array>,
  fromIndex: number,
  to: GrowableBuffer<Float32Array>,
  toIndex: number,
  size: number
): void {
  for (let i = 0; i < size; i++) {
    to.set(toIndex + i, from.get(fromIndex + i));
  }
}
