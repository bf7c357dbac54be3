/**
 * @file errors.ts
 * @description Closed error taxonomy for the engine. Every failure raised by a mutating
 * call is an `EngineError` whose `code` can be switched on exhaustively.
 */
import type { ValueType } from './value/value';

export type EngineErrorCode =
  | 'UnknownOperationType'
  | 'DuplicateOperationType'
  | 'DuplicateSlotName'
  | 'NodeNotFound'
  | 'NoInputSlot'
  | 'NoOutputSlot'
  | 'NoConfigSlot'
  | 'EdgeNotFound'
  | 'IncompatibleTypes'
  | 'CreatesLoop'
  | 'NotInputNode'
  | 'InputHasConnection'
  | 'NotTextureSlot'
  | 'Value'
  | 'Document'
  | 'Script';

export abstract class EngineError extends Error {
  abstract readonly code: EngineErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

// Registration

export class UnknownOperationTypeError extends EngineError {
  readonly code = 'UnknownOperationType';
  constructor(readonly library: string, readonly operator: string) {
    super(`Unknown operation type ${library}/${operator}`);
  }
}

export class DuplicateOperationTypeError extends EngineError {
  readonly code = 'DuplicateOperationType';
  constructor(readonly library: string, readonly operator: string) {
    super(`Operation type ${library}/${operator} is already registered`);
  }
}

export type SlotList = 'inputs' | 'outputs' | 'config';

export class DuplicateSlotNameError extends EngineError {
  readonly code = 'DuplicateSlotName';
  constructor(readonly slotName: string, readonly list: SlotList) {
    super(`Node was configured with two slots named ${slotName} on its ${list}.`);
  }
}

// Stale handles

export class NodeNotFoundError extends EngineError {
  readonly code = 'NodeNotFound';
  constructor(readonly node: string) {
    super(`Node ${node} does not exist`);
  }
}

export class NoInputSlotError extends EngineError {
  readonly code = 'NoInputSlot';
  constructor(readonly slot: number) {
    super(`Node has no input slot ${slot}`);
  }
}

export class NoOutputSlotError extends EngineError {
  readonly code = 'NoOutputSlot';
  constructor(readonly slot: number) {
    super(`Node has no output slot ${slot}`);
  }
}

export class NoConfigSlotError extends EngineError {
  readonly code = 'NoConfigSlot';
  constructor(readonly slot: number) {
    super(`Node has no config slot ${slot}`);
  }
}

export class EdgeNotFoundError extends EngineError {
  readonly code = 'EdgeNotFound';
  constructor() {
    super('No edge connects those slots');
  }
}

// Rejected mutations

export class IncompatibleTypesError extends EngineError {
  readonly code = 'IncompatibleTypes';
  constructor(readonly from: ValueType, readonly to: ValueType) {
    super(`Cannot connect an output of type ${from} to an input of type ${to}`);
  }
}

export class CreatesLoopError extends EngineError {
  readonly code = 'CreatesLoop';
  constructor() {
    super('Connection would create a cycle in the graph');
  }
}

// API misuse

export class NotInputNodeError extends EngineError {
  readonly code = 'NotInputNode';
  constructor() {
    super('Node accessed while modifying graph input was not an instance of core/input.');
  }
}

export class InputHasConnectionError extends EngineError {
  readonly code = 'InputHasConnection';
  constructor() {
    super('Input node has incoming connection and cannot be edited');
  }
}

export class NotTextureSlotError extends EngineError {
  readonly code = 'NotTextureSlot';
  constructor(readonly slot: number) {
    super(`Output slot ${slot} does not hold a texture`);
  }
}

// Values

export type ValueErrorKind = 'typeMismatch' | 'slotIndex' | 'textureData';

export class ValueError extends EngineError {
  readonly code = 'Value';
  constructor(readonly kind: ValueErrorKind, message: string) {
    super(message);
  }

  static typeMismatch(expected: ValueType, actual: string): ValueError {
    return new ValueError('typeMismatch', `Expected a value of type ${expected}, got ${actual}`);
  }

  static slotIndex(index: number, length: number): ValueError {
    return new ValueError('slotIndex', `Slot ${index} is out of range (${length} slots)`);
  }
}

// Documents

export interface DocumentIssue {
  path: string[];
  message: string;
  code: string;
}

export class DocumentError extends EngineError {
  readonly code = 'Document';
  constructor(readonly issues: DocumentIssue[]) {
    super(`Invalid graph document:\n${issues.map(i => `  ${i.path.join('.') || '<root>'}: ${i.message}`).join('\n')}`);
  }
}

// Embedded sources

export interface LocatedError {
  message: string;
  line: number;
  column: number;
}

export function formatLocatedError(err: LocatedError): string {
  return `${err.line}:${err.column}: ${err.message}`;
}

export class ScriptError extends EngineError {
  readonly code = 'Script';
  constructor(readonly errors: LocatedError[]) {
    super(errors.map(formatLocatedError).join('\n'));
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
