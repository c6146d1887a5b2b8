import { formatType, type Type } from "../ir/types";

export class UnsupportedTypeError extends Error {
  name = "UnsupportedTypeError";

  constructor(readonly type: Type) {
    super(`no conversion for type ${formatType(type)}`);
  }
}

export class StructuralViolationError extends Error {
  name = "StructuralViolationError";
}

export type BlockedOp = {
  id: number;
  name: string;
};

export type StuckReason = "no_applicable_pattern" | "rewrite_limit";

export class NoApplicablePatternError extends Error {
  name = "NoApplicablePatternError";

  constructor(
    readonly reason: StuckReason,
    readonly first: BlockedOp,
    readonly last: BlockedOp,
    readonly blockedCount: number,
  ) {
    super(
      reason === "rewrite_limit"
        ? `rewrite limit reached with ${blockedCount} illegal op(s); first: ${first.name} (#${first.id})`
        : `failed to legalize ${blockedCount} op(s); first: ${first.name} (#${first.id}), last: ${last.name} (#${last.id})`,
    );
  }
}

export type ConversionError =
  | UnsupportedTypeError
  | StructuralViolationError
  | NoApplicablePatternError;
