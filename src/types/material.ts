/**
 * Material types parsed from MTL files
 */

/**
 * RGB color, each channel usually in [0, 1]
 */
export interface Color {
  r: number;
  g: number;
  b: number;
}

/**
 * A single non-PBR material.
 * Map paths are `null` when the material has no such map; an empty string is a map
 * declared with an empty path.
 */
export interface Material {
  name: string;

  ambientColor: Color;   // Ka
  diffuseColor: Color;   // Kd
  specularColor: Color;  // Ks

  ambientMapPath: string | null;   // map_Ka
  diffuseMapPath: string | null;   // map_Kd
  specularMapPath: string | null;  // map_Ks
  normalMapPath: string | null;    // map_Bump / bump

  opacity: number;           // d, or 1 - Tr
  specularExponent: number;  // Ns
  refractionIndex: number;   // Ni
}

/**
 * Creates a material with every property at its default
 */
export function createDefaultMaterial(name: string): Material {
  return {
    name,
    ambientColor: { r: 0, g: 0, b: 0 },
    diffuseColor: { r: 0, g: 0, b: 0 },
    specularColor: { r: 0, g: 0, b: 0 },
    ambientMapPath: null,
    diffuseMapPath: null,
    specularMapPath: null,
    normalMapPath: null,
    opacity: 1,
    specularExponent: 1,
    refractionIndex: 1,
  };
}
