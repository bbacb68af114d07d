import type { ModelFormat, ModelWarning, SourceLocation } from "./types";

export type RobotDiffErrorCode = "parse" | "unsupported_element" | "format_detection" | "comparison_scope";

export abstract class RobotDiffError extends Error {
  abstract readonly code: RobotDiffErrorCode;
}

const formatLocation = (location: SourceLocation) =>
  `${location.file}${location.line !== undefined ? `:${location.line}` : ""} (${location.path})`;

export class ParseError extends RobotDiffError {
  readonly code = "parse";

  constructor(
    readonly location: SourceLocation,
    readonly reason: string
  ) {
    super(`${formatLocation(location)}: ${reason}`);
    this.name = "ParseError";
  }
}

export class UnsupportedElementError extends RobotDiffError {
  readonly code = "unsupported_element";

  constructor(
    readonly location: SourceLocation,
    readonly element: string,
    readonly reason = `Unsupported element '${element}' ignored.`
  ) {
    super(`${formatLocation(location)}: ${reason}`);
    this.name = "UnsupportedElementError";
  }

  toWarning(): ModelWarning {
    return { element: this.element, reason: this.reason, location: this.location };
  }
}

export class FormatDetectionError extends RobotDiffError {
  readonly code = "format_detection";

  constructor(
    readonly path: string,
    readonly reason: string
  ) {
    super(`Cannot select a format for '${path}': ${reason}`);
    this.name = "FormatDetectionError";
  }
}

export class ComparisonScopeError extends RobotDiffError {
  readonly code = "comparison_scope";

  constructor(
    readonly requested: string,
    readonly reason: string,
    readonly format?: ModelFormat
  ) {
    super(`Field scope '${requested}' cannot be compared: ${reason}`);
    this.name = "ComparisonScopeError";
  }
}
