export type { AlignmentResult } from './aligner.js';
export { align, alignTool } from './aligner.js';
