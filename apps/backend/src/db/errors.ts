import pg from "pg";
import { ValidationError } from "../http/errors.js";
import {
  TABLE_LABELS,
  relationByName,
  uniqueByName,
  type Relation,
  type UniqueConstraint,
} from "./constraints.js";

const UNIQUE_VIOLATION = "23505";
const FOREIGN_KEY_VIOLATION = "23503";

export function uniqueViolation(constraint: UniqueConstraint): ValidationError {
  return constraint.field
    ? ValidationError.field(constraint.field, constraint.message)
    : ValidationError.form(constraint.message);
}

export function missingReference(relation: Relation): ValidationError {
  return ValidationError.field(relation.column, "Referenced record does not exist.");
}

export function protectedDelete(relation: Relation): ValidationError {
  return ValidationError.form(
    `Cannot delete this ${TABLE_LABELS[relation.parent]} because it is referenced by existing ${TABLE_LABELS[relation.child]}.`
  );
}

// Maps constraint failures raised by Postgres onto field-level validation errors.
export function translateDbError(err: unknown): unknown {
  if (!(err instanceof pg.DatabaseError) || !err.constraint) return err;

  if (err.code === UNIQUE_VIOLATION) {
    const constraint = uniqueByName(err.constraint);
    return constraint ? uniqueViolation(constraint) : err;
  }

  if (err.code === FOREIGN_KEY_VIOLATION) {
    const relation = relationByName(err.constraint);
    if (!relation) return err;
    // Raised on the parent table when a delete hits a RESTRICT reference.
    return err.table === relation.parent ? protectedDelete(relation) : missingReference(relation);
  }

  return err;
}
