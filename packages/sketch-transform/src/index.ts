export {
  transformSketch,
  transformPoint,
  translateSketch,
  rotateSketch,
  resolvePivot
} from "./transform.js";
export { sketchCentroid, sketchBounds, representativePoints } from "./measure.js";
export {
  DEFAULT_TRANSFORM,
  transformRequestSchema,
  parseTransformRequest,
  resolveTransformRequest,
  isIdentityTransform,
  type PivotPolicy,
  type TransformRequest
} from "./request.js";
