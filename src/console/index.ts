// pattern: Functional Core

export { formatRunEvent, createConsoleRenderer, clip, TOOL_OUTPUT_LIMIT } from './renderer.js';
