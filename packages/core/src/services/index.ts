export { AttachmentManager } from './attachment-manager.js';
export type { AttachmentManagerOptions } from './attachment-manager.js';
