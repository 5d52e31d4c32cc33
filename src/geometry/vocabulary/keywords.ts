/**
 * Vocabulary - Single source of truth for geometry keywords
 *
 * Primitive names follow the WebGL/regl spelling so a draw command can be
 * handed to a regl-style backend without translation. `quads` and `polygon`
 * have no WebGL counterpart and are left for the backend to expand.
 */

// ============================================
// Primitive Keywords
// ============================================

export const primitiveKeywords = {
  points: "points",
  lines: "lines",
  lineLoop: "line loop",
  triangleFan: "triangle fan",
  quads: "quads",
  polygon: "polygon",
} as const;
