export * from './commands/generate-glitch-video.command.js';
export * from './dto/generate-glitch-video.dto.js';
export * from './handlers/generate-glitch-video.handler.js';
export * from './pipeline/glitch-video-stages.js';
export * from './pipeline/stage-graph.js';
