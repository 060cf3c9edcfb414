export * from './math';
export * from './loop';
export * from './physics/convex-shape';
export * from './physics/shape-cast';
export * from './physics/physics-space';
export * from './physics/settings';
export * from './input/input';
export * from './bodies/polygon-body';
export * from './bodies/soft-body-controller';
export * from './renderers/polygon-graphics';
export * from './renderers/pixi';
