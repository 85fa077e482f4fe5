export * from './contracts/artifact-manifest.js';
export * from './contracts/frame-synthesizer.js';
export * from './contracts/glitch-transform.js';
export * from './contracts/source-image-loader.js';
export * from './contracts/video-encoder.js';
export * from './effects/motion.js';
export * from './effects/segment-assembly.js';
export * from './effects/transitions.js';
export * from './entities/pipeline-artifacts.js';
export * from './entities/timing-plan.js';
export * from './filters/expression.js';
export * from './filters/filter-graph.js';
export * from './value-objects/amplitude-schedule.js';
export * from './value-objects/motion-preset.js';
export * from './value-objects/raster-image.js';
export * from './value-objects/transition-settings.js';
