export * from './types';
export * from './profiles';
export * from './config';
export * from './digest';
export * from './manifest-reader';
export * from './layer-planner';
export * from './build-root';
export * from './stage-executor';
export * from './privilege-reducer';
export * from './artifact-finalizer';
export * from './orchestrator';
export * from './dockerfile';
export * from './builder';
export * from './program';

// Re-export relevant types from core
export type { BuildContext, BuildPlan, FeatureProfile, Image, Layer } from '@strata/core';
