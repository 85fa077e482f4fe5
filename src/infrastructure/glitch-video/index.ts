export * from './cache/memory-cache.js';
export * from './ffmpeg/ffmpeg-binary.js';
export * from './ffmpeg/ffmpeg-video-encoder.js';
export * from './glitch/pixel-glitch-transform.js';
export * from './glitch/seeded-random.js';
export * from './manifest/json-manifest-store.js';
export * from './source/canvas-source-image-loader.js';
export * from './synthesis/glitch-frame-synthesizer.js';
