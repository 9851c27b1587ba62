export * from './types';
export * from './core/coords';
export * from './core/config';
export * from './core/errors';
export * from './core/logger';
export * from './core/entities';
export * from './state/graphStore';
export * from './state/records';
export * from './state/mutationLog';
export * from './state/selection';
export * from './state/camera';
export * from './persistence/coordinator';
export * from './storage/types';
export * from './storage/schema';
export * from './storage/memory';
export * from './storage/indexedDb';
export * from './input/surfaces';
export * from './input/eventRouter';
export * from './input/inputController';
export * from './input/wheel';
export * from './editor';
export * from './react/hooks';
export * from './react/useModal';
export * from './react/useScrollRegion';
export * from './react/useInputRouting';
