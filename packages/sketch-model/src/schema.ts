import { z } from "zod";

export const vec2Schema = z.object({
  x: z.number().finite(),
  y: z.number().finite(),
});

const primitiveBase = {
  id: z.string().min(1),
  construction: z.boolean().optional(),
};

export const lineDataSchema = z.object({
  ...primitiveBase,
  type: z.literal("line"),
  start: vec2Schema,
  end: vec2Schema,
});

export const circleDataSchema = z.object({
  ...primitiveBase,
  type: z.literal("circle"),
  center: vec2Schema,
  radius: z.number().finite().nonnegative(),
});

export const arcDataSchema = z.object({
  ...primitiveBase,
  type: z.literal("arc"),
  center: vec2Schema,
  startPoint: vec2Schema,
  endPoint: vec2Schema,
  radius: z.number().finite().nonnegative(),
  ccw: z.boolean(),
});

export const pointDataSchema = z.object({
  ...primitiveBase,
  type: z.literal("point"),
  position: vec2Schema,
});

export const splineDataSchema = z.object({
  ...primitiveBase,
  type: z.literal("spline"),
  controlPoints: z.array(vec2Schema).min(2),
  knots: z.array(z.number().finite()),
  degree: z.number().int().positive(),
});

export const primitiveDataSchema = z.discriminatedUnion("type", [
  lineDataSchema,
  circleDataSchema,
  arcDataSchema,
  pointDataSchema,
  splineDataSchema,
]);

export const constraintDataSchema = z.object({
  id: z.string().min(1),
  type: z.string().min(1),
  references: z.array(z.string()),
  value: z.number().finite().optional(),
});

export const solverStatusSchema = z.object({
  state: z.enum(["fully-constrained", "under-constrained", "over-constrained", "inconsistent", "unknown"]),
  degreesOfFreedom: z.number().int().nonnegative().optional(),
});

export const sketchDocumentDataSchema = z
  .object({
    name: z.string(),
    primitives: z.array(primitiveDataSchema),
    constraints: z.array(constraintDataSchema).default([]),
    solverStatus: solverStatusSchema.optional(),
  })
  .superRefine((doc, ctx) => {
    const seen = new Set<string>();
    doc.primitives.forEach((primitive, index) => {
      if (seen.has(primitive.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["primitives", index, "id"],
          message: `Duplicate primitive id "${primitive.id}"`,
        });
      }
      seen.add(primitive.id);
    });
  });

export type PrimitiveData = z.infer<typeof primitiveDataSchema>;
export type PrimitiveKind = PrimitiveData["type"];
export type ConstraintData = z.infer<typeof constraintDataSchema>;
export type SolverStatus = z.infer<typeof solverStatusSchema>;
export type SketchDocumentData = z.infer<typeof sketchDocumentDataSchema>;
