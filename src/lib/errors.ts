/**
 * Error types shared by the layout and wiring mappers
 */

import type { ValidationIssue } from "@/lib/led-mapping/types"

export class LedMappingError extends Error {
  constructor(
    message: string,
    public code: string,
  ) {
    super(message)
    this.name = "LedMappingError"
  }
}

/** A layout or wiring parameter is invalid for its kind. Never retried. */
export class ConfigurationError extends LedMappingError {
  constructor(message: string) {
    super(message, "CONFIGURATION_ERROR")
    this.name = "ConfigurationError"
  }
}

/** A stored mapping table does not fit its layout or grid. */
export class MappingValidationError extends LedMappingError {
  constructor(
    message: string,
    public issues: ValidationIssue[] = [],
  ) {
    super(message, "VALIDATION_ERROR")
    this.name = "MappingValidationError"
  }
}

export class IndexOutOfRangeError extends LedMappingError {
  constructor(
    public index: number,
    public length: number,
  ) {
    super(`LED index ${index} is out of range (0..${length - 1})`, "INDEX_OUT_OF_RANGE")
    this.name = "IndexOutOfRangeError"
  }
}

export class SizeMismatchError extends LedMappingError {
  constructor(
    public expected: number,
    public actual: number,
  ) {
    super(
      `Pixel buffer has ${actual} entries, expected ${expected}`,
      "SIZE_MISMATCH",
    )
    this.name = "SizeMismatchError"
  }
}

/** A persisted pattern layout could not be decoded. */
export class PatternFormatError extends LedMappingError {
  constructor(message: string) {
    super(message, "PATTERN_FORMAT_ERROR")
    this.name = "PatternFormatError"
  }
}
