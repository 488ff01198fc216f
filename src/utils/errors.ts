import { IdentityField, IdentityFragment } from '../types/common';

export type ArchiveErrorCode =
  | 'INVALID_RECORD'
  | 'UNSUPPORTED_KIND'
  | 'AMBIGUOUS_IDENTITY'
  | 'CONFLICTING_IDENTITY'
  | 'IDENTITY_NOT_FOUND'
  | 'UNKNOWN_INTERACTION'
  | 'RECORD_ALREADY_INDEXED'
  | 'REGISTRY_STATE'
  | 'CONFIGURATION';

export type AttributionSide = 'sender' | 'receiver';

/**
 * Base class for every failure that aborts an archive run.
 *
 * `details` carries the structured context (field names, competing values,
 * offending record) that the CLI logs when the run stops.
 */
export abstract class ArchiveError extends Error {
  abstract readonly code: ArchiveErrorCode;
  readonly details: Record<string, unknown>;

  constructor(message: string, details: Record<string, unknown> = {}) {
    super(message);
    this.name = new.target.name;
    this.details = details;
  }
}

export class InvalidRecordError extends ArchiveError {
  readonly code = 'INVALID_RECORD';

  constructor(readonly record: unknown, readonly issues: string[]) {
    super(`Invalid SMS record: ${issues.join('; ')}`, { record, issues });
  }
}

export class UnsupportedKindError extends ArchiveError {
  readonly code = 'UNSUPPORTED_KIND';

  constructor(readonly kind: number, readonly recordId: number) {
    super(`SMS type is not supported: ${kind}`, { kind, recordId });
  }
}

export class AmbiguousIdentityError extends ArchiveError {
  readonly code = 'AMBIGUOUS_IDENTITY';

  constructor(
    readonly side: AttributionSide,
    readonly field: IdentityField,
    readonly values: string[],
    readonly recordId: number
  ) {
    super(`Multiple ${field} values for ${side} of record ${recordId}: ${values.join(', ')}`, {
      side,
      field,
      values,
      recordId
    });
  }
}

export class ConflictingIdentityError extends ArchiveError {
  readonly code = 'CONFLICTING_IDENTITY';

  constructor(readonly field: IdentityField, readonly existing: string, readonly incoming: string) {
    super(`User has two ${field} values: ${existing} / ${incoming}`, { field, existing, incoming });
  }
}

export class IdentityNotFoundError extends ArchiveError {
  readonly code = 'IDENTITY_NOT_FOUND';

  constructor(readonly fragment: IdentityFragment) {
    super(`No resolved user matches ${describeFragment(fragment)}`, { fragment });
  }
}

export class UnknownInteractionError extends ArchiveError {
  readonly code = 'UNKNOWN_INTERACTION';

  constructor(first: IdentityFragment, second: IdentityFragment) {
    super(`No conversation registered between ${describeFragment(first)} and ${describeFragment(second)}`, {
      first,
      second
    });
  }
}

export class RecordAlreadyIndexedError extends ArchiveError {
  readonly code = 'RECORD_ALREADY_INDEXED';

  constructor(readonly recordId: number, readonly existing: string, readonly incoming: string) {
    super(`Record ${recordId} already belongs to conversation ${existing}`, { recordId, existing, incoming });
  }
}

export class RegistryStateError extends ArchiveError {
  readonly code = 'REGISTRY_STATE';

  constructor(operation: string, reason: string) {
    super(`${operation}: ${reason}`, { operation, reason });
  }
}

export class ConfigurationError extends ArchiveError {
  readonly code = 'CONFIGURATION';

  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`, { issues });
  }
}

export type IndexingError =
  | UnsupportedKindError
  | AmbiguousIdentityError
  | ConflictingIdentityError
  | IdentityNotFoundError
  | UnknownInteractionError
  | RecordAlreadyIndexedError
  | RegistryStateError;

export function describeFragment(fragment: IdentityFragment): string {
  return `(${fragment.phone ?? 'None'}, ${fragment.name ?? 'None'}, ${fragment.email ?? 'None'})`;
}
