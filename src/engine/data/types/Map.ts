// ─────────────────────────────────────────────
//  Map / Grid Types
// ─────────────────────────────────────────────

/** A point on the battle grid. Cells are 1 unit wide; troops move continuously. */
export interface Pos {
  x: number;
  y: number;
}
