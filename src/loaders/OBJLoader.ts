/**
 * OBJLoader - loads OBJ meshes and MTL materials from files
 *
 * Every call owns its working set: the file is opened, parsed to completion and
 * closed before the call returns. A failure never yields a partial result.
 */

import { dirname, resolve } from 'node:path';
import { FileSource } from '../core/CharSource';
import { resolveLoaderOptions, type LoaderOptions, type LoaderOptionsInput } from '../core/config';
import { captureLoad, type LoadResult } from '../core/LoaderError';
import type { Material, Mesh } from '../types';
import { MTLParser } from './MTLParser';
import { OBJParser, type ParsedOBJData } from './OBJParser';

/**
 * An OBJ file together with the materials of every library it references
 */
export interface LoadedModel {
  meshes: Mesh[];
  materials: Material[];
  /** `mtllib` references as written in the OBJ file */
  materialLibraries: string[];
}

export class OBJLoader {
  private readonly options: LoaderOptions;

  /**
   * @throws ZodError when the options are invalid
   */
  constructor(options: LoaderOptionsInput = {}) {
    this.options = resolveLoaderOptions(options);
  }

  /**
   * Loads every mesh of an OBJ file
   */
  loadMeshes(path: string): LoadResult<Mesh[]> {
    return captureLoad(() => this.readOBJ(path).meshes);
  }

  /**
   * Loads every material of an MTL file
   */
  loadMaterials(path: string): LoadResult<Material[]> {
    return captureLoad(() => this.readMTL(path));
  }

  /**
   * Parses OBJ text that is already in memory
   */
  parseMeshes(text: string): LoadResult<Mesh[]> {
    return captureLoad(() => new OBJParser(this.options).parse(text).meshes);
  }

  /**
   * Parses MTL text that is already in memory
   */
  parseMaterials(text: string): LoadResult<Material[]> {
    return captureLoad(() => new MTLParser(this.options).parse(text));
  }

  /**
   * Loads an OBJ file and the MTL libraries it names, resolved against the OBJ file's
   * directory. A library that cannot be opened fails the whole call.
   */
  loadModel(path: string): LoadResult<LoadedModel> {
    return captureLoad(() => {
      const { meshes, materialLibraries } = this.readOBJ(path);
      const baseDir = dirname(path);

      const materials: Material[] = [];
      for (const library of materialLibraries) {
        materials.push(...this.readMTL(resolve(baseDir, library)));
      }

      if (this.options.debug) {
        console.log(
          `OBJLoader: ${path}: ${meshes.length} meshes, ${materials.length} materials from ${materialLibraries.length} libraries`
        );
      }

      return { meshes, materials, materialLibraries };
    });
  }

  private readOBJ(path: string): ParsedOBJData {
    return this.withFile(path, (source) => new OBJParser(this.options).parseSource(source));
  }

  private readMTL(path: string): Material[] {
    return this.withFile(path, (source) => new MTLParser(this.options).parseSource(source));
  }

  private withFile<T>(path: string, read: (source: FileSource) => T): T {
    const source = FileSource.open(path, this.options.readChunkSize);
    try {
      return read(source);
    } finally {
      source.close();
    }
  }
}

/**
 * Loads every mesh of an OBJ file
 */
export function loadMeshes(path: string, options?: LoaderOptionsInput): LoadResult<Mesh[]> {
  return new OBJLoader(options).loadMeshes(path);
}

/**
 * Loads every material of an MTL file
 */
export function loadMaterials(path: string, options?: LoaderOptionsInput): LoadResult<Material[]> {
  return new OBJLoader(options).loadMaterials(path);
}

export function loadModel(path: string, options?: LoaderOptionsInput): LoadResult<LoadedModel> {
  return new OBJLoader(options).loadModel(path);
}

export function parseMeshes(text: string, options?: LoaderOptionsInput): LoadResult<Mesh[]> {
  return new OBJLoader(options).parseMeshes(text);
}

export function parseMaterials(text: string, options?: LoaderOptionsInput): LoadResult<Material[]> {
  return new OBJLoader(options).parseMaterials(text);
}

/**
 * Releases a mesh list in place: every mesh drops its buffers and the list is emptied
 */
export function freeMeshes(meshes: Mesh[]): void {
  for (const mesh of meshes) {
    mesh.vertices = new Float32Array(0);
    mesh.indices = new Uint32Array(0);
    mesh.numVertices = 0;
    mesh.numIndices = 0;
  }
  meshes.length = 0;
}

/**
 * Releases a material list in place
 */
export function freeMaterials(materials: Material[]): void {
  materials.length = 0;
}

/**
 * Resolves a mesh's material name. When a library defines a name twice, the later one wins.
 */
export function findMaterial(materials: readonly Material[], name: string): Material | null {
  for (let i = materials.length - 1; i >= 0; i--) {
    if (materials[i].name === name) {
      return materials[i];
    }
  }
  return null;
}
