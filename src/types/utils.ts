/**
 * UI Type Definitions
 */

/** Semantic colors understood by utils/ui */
export type SemanticColor = 'error' | 'warning' | 'info';
