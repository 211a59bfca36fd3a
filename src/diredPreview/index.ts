/**
 * Dired Preview Module
 * Inline image previews for entries of a dired-style listing
 */

export { PreviewOverlayManager, createPreviewSession } from './previewManager';
export { DiredPreviewController, registerDiredPreviewCommands } from './previewCommands';
export * from './previewTypes';
