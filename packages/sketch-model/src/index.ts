export {
  SketchPrimitive,
  Line,
  Circle,
  Arc,
  Point,
  Spline,
  primitiveFromData,
  type PointMapper
} from './primitive.js';
export { cloneConstraint, type SketchConstraint } from './constraint.js';
export { SketchDocument, type SketchDocumentInit } from './document.js';
export {
  vec2Schema,
  primitiveDataSchema,
  constraintDataSchema,
  solverStatusSchema,
  sketchDocumentDataSchema,
  type ConstraintData,
  type PrimitiveData,
  type PrimitiveKind,
  type SketchDocumentData,
  type SolverStatus
} from './schema.js';
