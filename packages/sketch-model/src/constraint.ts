import type { ConstraintData } from './schema.js';

/**
 * A geometric constraint as recorded by the source CAD system. The bridge never
 * evaluates constraints; it only carries them or drops them.
 */
export type SketchConstraint = ConstraintData;

export function cloneConstraint(constraint: SketchConstraint): SketchConstraint {
  return { ...constraint, references: [...constraint.references] };
}
