export * from './constants';
export * from './errors';
export * from './value/texture';
export * from './value/value';
export * from './registry/slot';
export * from './registry/signature';
export * from './registry/operation';
export * from './registry/op-registry';
export * from './graph/stable-graph';
export * from './graph/dirty-flag';
export * from './graph/node';
export * from './graph/document';
export * from './gpu/gpu-pool';
export * from './gpu/gpu-device';
export * from './gpu/gpu-cache';
export * from './runtime/execution-context';
export * from './state/history';
export * from './ops';
export * from './engine/engine';
