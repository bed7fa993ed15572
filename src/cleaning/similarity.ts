/**
 * Gestalt pattern-matching similarity (Ratcliff/Obershelp), via difflib.
 */
import difflib from "difflib";

/** Similarity in [0, 1]; 1 means identical. */
export function similarityRatio(a: string, b: string): number {
  return new difflib.SequenceMatcher(null, a, b).ratio();
}
