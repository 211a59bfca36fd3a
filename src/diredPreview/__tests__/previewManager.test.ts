/**
 * Tests for PreviewOverlayManager
 * Drives the manager through an in-memory host with one listing entry per line
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';

// Logger imports vscode; only the console is used in these tests
vi.mock('vscode', () => ({
    workspace: {
        getConfiguration: () => ({
            get: (key: string, defaultValue: unknown) => defaultValue
        })
    }
}));

import {
    createPreviewSession,
    fileExtension,
    formatHint,
    PreviewOverlayManager
} from '../previewManager';
import { imageFilenamePattern } from '../imageRenderer';
import {
    DEFAULT_PREVIEW_CONFIG,
    Disposable,
    ImageDecodeError,
    OverlayContent,
    PreviewConfig,
    PreviewHost,
    PreviewSession,
    RenderConstraints,
    RenderedImage
} from '../previewTypes';

class FakeOverlay implements Disposable {
    disposed = false;

    constructor(public position: number, public content: OverlayContent) {}

    dispose(): void {
        this.disposed = true;
    }
}

/**
 * Line n spans offsets n*100 .. n*100+99; files[n] is the entry on line n
 */
class FakeHost implements PreviewHost {
    line = 0;
    column = 0;
    displaySupported = true;
    renderError?: Error;
    renders: { file: string; formatHint: string; constraints: RenderConstraints }[] = [];
    overlays: FakeOverlay[] = [];
    cursorListeners: (() => void)[] = [];

    constructor(public files: (string | undefined)[]) {}

    resolveFileAtCursor(): string | undefined {
        return this.files[this.line];
    }

    cursorPosition(): number {
        return this.line * 100 + this.column;
    }

    lineEndPosition(): number {
        return this.line * 100 + 99;
    }

    isImageDisplaySupported(): boolean {
        return this.displaySupported;
    }

    imageFilenamePattern(): RegExp {
        return imageFilenamePattern(DEFAULT_PREVIEW_CONFIG.imageExtensions);
    }

    renderImage(file: string, hint: string, constraints: RenderConstraints): RenderedImage {
        if (this.renderError) {
            throw this.renderError;
        }
        this.renders.push({ file, formatHint: hint, constraints });
        return { path: file, format: hint, width: 40, height: 30 };
    }

    createOverlay(position: number, content: OverlayContent): Disposable {
        const overlay = new FakeOverlay(position, content);
        this.overlays.push(overlay);
        return overlay;
    }

    scheduleDelayed(seconds: number, callback: () => void): Disposable {
        const timer = setTimeout(callback, seconds * 1000);
        return { dispose: () => clearTimeout(timer) };
    }

    onCursorMoved(callback: () => void): Disposable {
        this.cursorListeners.push(callback);
        return {
            dispose: () => {
                this.cursorListeners = this.cursorListeners.filter(listener => listener !== callback);
            }
        };
    }

    /** Move the cursor and fire the movement event */
    moveTo(line: number, column: number = 0): void {
        this.line = line;
        this.column = column;
        for (const listener of this.cursorListeners) {
            listener();
        }
    }
}

function anchors(session: PreviewSession): number[] {
    return session.overlays.map(record => record.anchorPosition);
}

describe('fileExtension', () => {
    it('should return the text after the last dot', () => {
        expect(fileExtension('/pics/a.png')).toBe('png');
        expect(fileExtension('archive.tar.gz')).toBe('gz');
    });

    it('should not treat a leading dot as an extension', () => {
        expect(fileExtension('/home/alice/.png')).toBeUndefined();
        expect(fileExtension('README')).toBeUndefined();
    });

    it('should lowercase the extension for the format hint', () => {
        expect(formatHint('/pics/PHOTO.JPG')).toBe('jpg');
        expect(formatHint('README')).toBe('');
    });
});

describe('PreviewOverlayManager', () => {
    let config: PreviewConfig;
    let manager: PreviewOverlayManager;
    let host: FakeHost;
    let session: PreviewSession;

    beforeEach(() => {
        config = { ...DEFAULT_PREVIEW_CONFIG };
        manager = new PreviewOverlayManager(() => config);
        host = new FakeHost(['/pics/a.png', '/pics/b.jpg', '/pics/c.gif', '/pics/notes.txt', undefined]);
        session = createPreviewSession(host);
    });

    describe('isPreviewable', () => {
        it('should accept an image and reject an excluded extension', () => {
            expect(manager.isPreviewable(session, 'a.png')).toBe(true);
            expect(manager.isPreviewable(session, 'a.ico')).toBe(false);
            expect(manager.isPreviewable(session, 'a.cur')).toBe(false);
        });

        it('should match excluded extensions case-sensitively', () => {
            expect(manager.isPreviewable(session, 'a.ICO')).toBe(true);
        });

        it('should reject absent files and non-image names', () => {
            expect(manager.isPreviewable(session, undefined)).toBe(false);
            expect(manager.isPreviewable(session, '')).toBe(false);
            expect(manager.isPreviewable(session, 'notes.txt')).toBe(false);
        });

        it('should reject everything when image display is unsupported', () => {
            host.displaySupported = false;
            expect(manager.isPreviewable(session, 'a.png')).toBe(false);
        });

        it('should reject paths matching an exclude pattern', () => {
            config.excludePatterns = ['thumb-*'];
            expect(manager.isPreviewable(session, '/pics/thumb-1.png')).toBe(false);
            expect(manager.isPreviewable(session, '/pics/full-1.png')).toBe(true);
        });

        it('should read the configuration at call time', () => {
            config.excludedExtensions = ['png'];
            expect(manager.isPreviewable(session, 'a.png')).toBe(false);
        });
    });

    describe('show', () => {
        it('should create one overlay at the end of the cursor line', () => {
            host.line = 1;
            manager.show(session);

            expect(anchors(session)).toEqual([199]);
            expect(host.overlays).toHaveLength(1);
            expect(host.overlays[0].position).toBe(199);
        });

        it('should pass scale, caps and the lowercased extension to the renderer', () => {
            config.scale = 0.25;
            config.maxWidth = 300;
            host.files[0] = '/pics/SHOT.PNG';

            manager.show(session);

            expect(host.renders).toEqual([{
                file: '/pics/SHOT.PNG',
                formatHint: 'png',
                constraints: { scale: 0.25, maxWidth: 300, maxHeight: undefined }
            }]);
        });

        it('should surround the image with the configured spacing', () => {
            config.spacing = 2;
            manager.show(session);

            expect(session.overlays[0].renderedContent).toEqual({
                leadingSpacing: 2,
                placeholder: ' ',
                image: { path: '/pics/a.png', format: 'png', width: 40, height: 30 },
                trailingSpacing: 2
            });
        });

        it('should do nothing on a line without an eligible file', () => {
            host.line = 3;
            manager.show(session);
            host.line = 4;
            manager.show(session);

            expect(session.overlays).toEqual([]);
            expect(host.renders).toEqual([]);
        });

        it('should keep only the newest preview when autoRemove is on', () => {
            manager.show(session);
            host.line = 1;
            manager.show(session);

            expect(anchors(session)).toEqual([199]);
            expect(host.overlays[0].disposed).toBe(true);
            expect(host.overlays[1].disposed).toBe(false);
        });

        it('should keep every preview, newest first, when autoRemove is off', () => {
            config.autoRemove = false;
            manager.show(session);
            host.line = 1;
            manager.show(session);

            expect(anchors(session)).toEqual([199, 99]);
        });

        it('should allow two previews on one line when autoRemove is off', () => {
            config.autoRemove = false;
            manager.show(session);
            manager.show(session);

            expect(anchors(session)).toEqual([99, 99]);
        });

        it('should propagate a render failure without creating an overlay', () => {
            manager.show(session);
            host.line = 1;
            host.renderError = new ImageDecodeError('/pics/b.jpg', 'not a valid jpg image');

            expect(() => manager.show(session)).toThrow(ImageDecodeError);
            expect(host.overlays).toHaveLength(1);
            // autoRemove cleared the earlier preview before rendering
            expect(session.overlays).toEqual([]);
        });
    });

    describe('hideAtPoint', () => {
        it('should remove only the overlay on the cursor line', () => {
            config.autoRemove = false;
            manager.show(session);
            host.line = 1;
            manager.show(session);

            host.line = 0;
            manager.hideAtPoint(session);

            expect(anchors(session)).toEqual([199]);
            expect(host.overlays[0].disposed).toBe(true);
            expect(host.overlays[1].disposed).toBe(false);
        });

        it('should remove every duplicate on the cursor line', () => {
            config.autoRemove = false;
            manager.show(session);
            manager.show(session);

            manager.hideAtPoint(session);

            expect(session.overlays).toEqual([]);
            expect(host.overlays.every(overlay => overlay.disposed)).toBe(true);
        });

        it('should do nothing when the line has no overlay', () => {
            manager.show(session);
            host.line = 2;
            manager.hideAtPoint(session);

            expect(anchors(session)).toEqual([99]);
        });
    });

    describe('hideAll', () => {
        it('should be idempotent', () => {
            config.autoRemove = false;
            manager.show(session);
            host.line = 2;
            manager.show(session);

            manager.hideAll(session);
            expect(session.overlays).toEqual([]);
            manager.hideAll(session);
            expect(session.overlays).toEqual([]);
            expect(host.overlays.every(overlay => overlay.disposed)).toBe(true);
        });
    });

    describe('overlaysAtPoint', () => {
        it('should return only the records on the cursor line', () => {
            config.autoRemove = false;
            manager.show(session);
            host.line = 1;
            manager.show(session);
            manager.show(session);

            expect(manager.overlaysAtPoint(session).map(record => record.anchorPosition)).toEqual([199, 199]);

            host.line = 4;
            expect(manager.overlaysAtPoint(session)).toEqual([]);
        });
    });

    describe('toggle', () => {
        it('should flip the preview on the cursor line', () => {
            manager.toggle(session);
            expect(anchors(session)).toEqual([99]);

            manager.toggle(session);
            expect(session.overlays).toEqual([]);
        });

        it('should leave other lines alone', () => {
            config.autoRemove = false;
            manager.show(session);
            host.line = 1;

            manager.toggle(session);
            expect(anchors(session)).toEqual([199, 99]);

            manager.toggle(session);
            expect(anchors(session)).toEqual([99]);
        });
    });

    describe('auto preview', () => {
        beforeEach(() => {
            vi.useFakeTimers();
            config.autoPreviewMode = true;
        });

        afterEach(() => {
            vi.useRealTimers();
        });

        it('should not listen to the cursor when autoPreviewMode is off', () => {
            config.autoPreviewMode = false;
            manager.enableMode(session);

            expect(session.modeEnabled).toBe(true);
            expect(session.autoModeEnabled).toBe(false);
            expect(host.cursorListeners).toHaveLength(0);
        });

        it('should subscribe only once when enabled twice', () => {
            manager.enableMode(session);
            manager.enableMode(session);

            expect(host.cursorListeners).toHaveLength(1);
        });

        it('should show a preview after the cursor settles', () => {
            manager.enableMode(session);
            host.moveTo(1);

            vi.advanceTimersByTime(199);
            expect(session.overlays).toEqual([]);

            vi.advanceTimersByTime(1);
            expect(anchors(session)).toEqual([199]);
        });

        it('should collapse a burst of moves into one preview', () => {
            manager.enableMode(session);
            host.moveTo(0);
            vi.advanceTimersByTime(100);
            host.moveTo(1);
            vi.advanceTimersByTime(100);
            host.moveTo(2);

            vi.advanceTimersByTime(199);
            expect(host.renders).toEqual([]);

            vi.advanceTimersByTime(1);
            expect(host.renders.map(render => render.file)).toEqual(['/pics/c.gif']);
            expect(vi.getTimerCount()).toBe(0);
        });

        it('should record the cursor position when the move happens', () => {
            manager.enableMode(session);
            host.moveTo(1, 4);

            expect(session.lastCursorPosition).toBe(104);
        });

        it('should ignore events that do not move the cursor', () => {
            manager.enableMode(session);
            host.moveTo(1);
            vi.advanceTimersByTime(200);
            expect(host.renders).toHaveLength(1);

            host.moveTo(1);
            expect(vi.getTimerCount()).toBe(0);
        });

        it('should use the cursor position at the time the timer fires', () => {
            manager.enableMode(session);
            host.moveTo(0);
            // The cursor changes without a movement event
            host.line = 2;

            vi.advanceTimersByTime(200);

            expect(host.renders.map(render => render.file)).toEqual(['/pics/c.gif']);
            expect(anchors(session)).toEqual([299]);
        });

        it('should skip the preview when no file is at the cursor when the timer fires', () => {
            manager.enableMode(session);
            host.moveTo(4);

            vi.advanceTimersByTime(200);

            expect(session.overlays).toEqual([]);
            expect(session.debounceHandle).toBeUndefined();
        });

        it('should drop a pending preview when auto preview is turned off', () => {
            manager.enableMode(session);
            host.moveTo(1);

            config.autoPreviewMode = false;
            manager.enableMode(session);
            vi.advanceTimersByTime(1000);

            expect(session.overlays).toEqual([]);
            expect(host.renders).toEqual([]);
            expect(session.debounceHandle).toBeUndefined();
            expect(vi.getTimerCount()).toBe(0);
        });

        it('should not show a preview from a timer that fires after auto preview was cleared', () => {
            manager.enableMode(session);
            host.moveTo(1);
            // Timer left pending while the flag is cleared
            session.autoModeEnabled = false;

            vi.advanceTimersByTime(200);

            expect(host.renders).toEqual([]);
            expect(session.debounceHandle).toBeUndefined();
        });

        it('should use the configured delay', () => {
            config.delay = 1;
            manager.enableMode(session);
            host.moveTo(1);

            vi.advanceTimersByTime(999);
            expect(host.renders).toHaveLength(0);
            vi.advanceTimersByTime(1);
            expect(host.renders).toHaveLength(1);
        });
    });

    describe('disableMode', () => {
        beforeEach(() => {
            vi.useFakeTimers();
            config.autoPreviewMode = true;
        });

        afterEach(() => {
            vi.useRealTimers();
        });

        it('should clear overlays, pending timer and subscription', () => {
            config.autoRemove = false;
            manager.enableMode(session);
            manager.show(session);
            host.moveTo(1);
            expect(vi.getTimerCount()).toBe(1);

            manager.disableMode(session);

            expect(session.overlays).toEqual([]);
            expect(host.overlays[0].disposed).toBe(true);
            expect(vi.getTimerCount()).toBe(0);
            expect(session.debounceHandle).toBeUndefined();
            expect(host.cursorListeners).toHaveLength(0);
            expect(session.modeEnabled).toBe(false);
            expect(session.autoModeEnabled).toBe(false);
        });

        it('should stop reacting to cursor movement', () => {
            manager.enableMode(session);
            manager.disableMode(session);

            host.moveTo(1);
            manager.handleCursorMoved(session);
            vi.advanceTimersByTime(200);

            expect(host.renders).toEqual([]);
        });

        it('should switch between enabled and disabled with toggleMode', () => {
            manager.toggleMode(session);
            expect(session.modeEnabled).toBe(true);
            expect(host.cursorListeners).toHaveLength(1);

            manager.toggleMode(session);
            expect(session.modeEnabled).toBe(false);
            expect(host.cursorListeners).toHaveLength(0);
        });
    });
});
