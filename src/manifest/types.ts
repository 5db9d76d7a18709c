/**
 * Classification of a single manifest line
 */
export type ManifestLineKind =
  | 'blank'
  | 'category-marker'
  | 'path-annotation'
  | 'category-name'
  | 'module';

/**
 * A classified manifest line. Only `module` lines carry an identifier.
 */
export type ManifestLine =
  | { kind: Exclude<ManifestLineKind, 'module'>; text: string }
  | { kind: 'module'; text: string; identifier: string };
