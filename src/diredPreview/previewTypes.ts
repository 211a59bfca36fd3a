/**
 * Dired Preview Types
 * Type definitions shared by the preview overlay manager and its hosts
 */

/**
 * Anything that can be released, e.g. an overlay, a timer or a subscription
 */
export interface Disposable {
    dispose(): void;
}

/**
 * Process-wide preview settings (see package.json `diredPreview.*`)
 */
export interface PreviewConfig {
    /** Multiplier applied to the natural image size */
    scale: number;
    /** Seconds of idle time before an automatic preview is shown */
    delay: number;
    /** Separator count placed before and after the image */
    spacing: number;
    /** Clear all other previews before showing a new one */
    autoRemove: boolean;
    /** Pixel cap on the rendered width, unset means no cap */
    maxWidth?: number;
    /** Pixel cap on the rendered height, unset means no cap */
    maxHeight?: number;
    /** Whether cursor movement alone triggers a preview */
    autoPreviewMode: boolean;
    /** Extensions never previewed (case-sensitive, without the dot) */
    excludedExtensions: string[];
    /** Extensions recognized as image files */
    imageExtensions: string[];
    /** Globs of paths never previewed */
    excludePatterns: string[];
}

export interface RenderConstraints {
    scale: number;
    maxWidth?: number;
    maxHeight?: number;
}

/**
 * Decoded and scaled image, ready to be displayed
 */
export interface RenderedImage {
    path: string;
    /** Lowercased file extension used to pick the decoder */
    format: string;
    width: number;
    height: number;
}

/**
 * What an overlay displays: separators, a one-space placeholder replaced
 * by the image, then separators again
 */
export interface OverlayContent {
    leadingSpacing: number;
    placeholder: string;
    image: RenderedImage;
    trailingSpacing: number;
}

export interface OverlayRecord {
    /** Buffer offset of the end of the listing line */
    anchorPosition: number;
    renderedContent: OverlayContent;
    handle: Disposable;
}

/**
 * Services the host editor provides for one listing buffer
 */
export interface PreviewHost {
    /** Path of the entry on the cursor line, if that line names a file */
    resolveFileAtCursor(): string | undefined;
    cursorPosition(): number;
    /** Offset of the end of the cursor line */
    lineEndPosition(): number;
    isImageDisplaySupported(): boolean;
    imageFilenamePattern(): RegExp;
    /** Throws ImageDecodeError for unreadable or unsupported input */
    renderImage(file: string, formatHint: string, constraints: RenderConstraints): RenderedImage;
    createOverlay(position: number, content: OverlayContent): Disposable;
    scheduleDelayed(seconds: number, callback: () => void): Disposable;
    onCursorMoved(callback: () => void): Disposable;
}

/**
 * Preview state of one listing buffer
 */
export interface PreviewSession {
    host: PreviewHost;
    /** Most recent first */
    overlays: OverlayRecord[];
    debounceHandle?: Disposable;
    lastCursorPosition?: number;
    cursorSubscription?: Disposable;
    modeEnabled: boolean;
    autoModeEnabled: boolean;
}

/**
 * Error thrown when an image cannot be decoded
 */
export class ImageDecodeError extends Error {
    public readonly filePath: string;

    constructor(filePath: string, reason: string) {
        super(`Cannot display image ${filePath}: ${reason}`);
        this.name = 'ImageDecodeError';
        this.filePath = filePath;
    }
}

export const DEFAULT_PREVIEW_CONFIG: PreviewConfig = {
    scale: 0.5,
    delay: 0.2,
    spacing: 1,
    autoRemove: true,
    maxWidth: undefined,
    maxHeight: undefined,
    autoPreviewMode: false,
    excludedExtensions: ['ico', 'cur'],
    imageExtensions: ['png', 'jpeg', 'jpg', 'gif', 'bmp', 'webp', 'svg', 'tiff', 'tif', 'ico', 'cur'],
    excludePatterns: []
};
