import { cloneConstraint, type SketchConstraint } from './constraint.js';
import { primitiveFromData, type SketchPrimitive } from './primitive.js';
import { sketchDocumentDataSchema, type SketchDocumentData, type SolverStatus } from './schema.js';

export type SketchDocumentInit = {
  primitives?: Iterable<SketchPrimitive>;
  constraints?: SketchConstraint[];
  solverStatus?: SolverStatus;
};

export class SketchDocument {
  name: string;
  readonly primitives = new Map<string, SketchPrimitive>();
  constraints: SketchConstraint[];
  solverStatus?: SolverStatus;

  constructor(name: string, init: SketchDocumentInit = {}) {
    this.name = name;
    for (const primitive of init.primitives ?? []) {
      this.addPrimitive(primitive);
    }
    this.constraints = init.constraints ?? [];
    this.solverStatus = init.solverStatus;
  }

  static fromData(data: unknown): SketchDocument {
    const parsed = sketchDocumentDataSchema.parse(data);
    return new SketchDocument(parsed.name, {
      primitives: parsed.primitives.map(primitiveFromData),
      constraints: parsed.constraints.map(cloneConstraint),
      solverStatus: parsed.solverStatus ? { ...parsed.solverStatus } : undefined,
    });
  }

  get primitiveCount(): number {
    return this.primitives.size;
  }

  get constraintCount(): number {
    return this.constraints.length;
  }

  addPrimitive(primitive: SketchPrimitive): this {
    if (this.primitives.has(primitive.id)) {
      throw new Error(`Duplicate primitive id "${primitive.id}" in sketch "${this.name}"`);
    }
    this.primitives.set(primitive.id, primitive);
    return this;
  }

  getPrimitive(id: string): SketchPrimitive | undefined {
    return this.primitives.get(id);
  }

  clone(): SketchDocument {
    return new SketchDocument(this.name, {
      primitives: [...this.primitives.values()].map((p) => p.clone()),
      constraints: this.constraints.map(cloneConstraint),
      solverStatus: this.solverStatus ? { ...this.solverStatus } : undefined,
    });
  }

  toData(): SketchDocumentData {
    const data: SketchDocumentData = {
      name: this.name,
      primitives: [...this.primitives.values()].map((p) => p.toData()),
      constraints: this.constraints.map(cloneConstraint),
    };
    if (this.solverStatus) data.solverStatus = { ...this.solverStatus };
    return data;
  }
}
