import type { Backend, SketchInfo } from "@cadlink/cad-clients";

/** Picks which sketches to collect when a backend offers more than one. */
export interface SketchSelector {
  /** Resolves to the chosen names, or null when the choice was dismissed. */
  select(backend: Backend, sketches: readonly SketchInfo[]): Promise<string[] | null> | string[] | null;
}

export const selectAllSketches: SketchSelector = {
  select: (_backend, sketches) => sketches.map((sketch) => sketch.name),
};
