/**
 * Preview Overlay Manager
 * Shows image previews next to listing entries and tracks them per session.
 *
 * The manager holds no buffer state of its own: every operation receives the
 * PreviewSession of the listing it acts on, and reaches the editor only
 * through the session's PreviewHost.
 */

import * as path from 'path';
import { minimatch } from 'minimatch';
import { createLogger } from '../utils/logger';
import {
    OverlayContent,
    OverlayRecord,
    PreviewConfig,
    PreviewHost,
    PreviewSession
} from './previewTypes';

const log = createLogger('DiredPreview');

/**
 * Extension of a file name, without the dot.
 * A leading dot does not start an extension: `.png` has none.
 */
export function fileExtension(file: string): string | undefined {
    const name = path.basename(file).replace(/^\.+/, '');
    const dot = name.lastIndexOf('.');
    if (dot < 0) {
        return undefined;
    }
    return name.slice(dot + 1);
}

/**
 * Decoder key for a file: its extension, lowercased
 */
export function formatHint(file: string): string {
    return (fileExtension(file) ?? '').toLowerCase();
}

export function createPreviewSession(host: PreviewHost): PreviewSession {
    return {
        host,
        overlays: [],
        modeEnabled: false,
        autoModeEnabled: false
    };
}

export class PreviewOverlayManager {
    constructor(private readonly getConfig: () => PreviewConfig) {}

    /**
     * Whether a file may be previewed. Never throws; ineligible input is not an error.
     */
    isPreviewable(session: PreviewSession, file: string | undefined): file is string {
        if (!file) {
            return false;
        }
        if (!session.host.isImageDisplaySupported()) {
            return false;
        }

        const config = this.getConfig();
        const extension = fileExtension(file);
        if (extension !== undefined && config.excludedExtensions.includes(extension)) {
            return false;
        }
        if (config.excludePatterns.some(pattern => minimatch(file, pattern, { matchBase: true, dot: true }))) {
            return false;
        }

        return session.host.imageFilenamePattern().test(file);
    }

    /**
     * Overlays anchored at the end of the cursor line
     */
    overlaysAtPoint(session: PreviewSession): OverlayRecord[] {
        const anchor = session.host.lineEndPosition();
        return session.overlays.filter(record => record.anchorPosition === anchor);
    }

    /**
     * Show a preview of the file on the cursor line.
     * A render failure propagates and leaves no new overlay behind.
     */
    show(session: PreviewSession): void {
        const { host } = session;
        const file = host.resolveFileAtCursor();
        if (!this.isPreviewable(session, file)) {
            return;
        }

        const config = this.getConfig();
        if (config.autoRemove) {
            this.hideAll(session);
        }

        const anchorPosition = host.lineEndPosition();
        const image = host.renderImage(file, formatHint(file), {
            scale: config.scale,
            maxWidth: config.maxWidth,
            maxHeight: config.maxHeight
        });

        const renderedContent: OverlayContent = {
            leadingSpacing: config.spacing,
            placeholder: ' ',
            image,
            trailingSpacing: config.spacing
        };
        const handle = host.createOverlay(anchorPosition, renderedContent);
        session.overlays.unshift({ anchorPosition, renderedContent, handle });

        log.debug('Preview shown', { file, anchorPosition, width: image.width, height: image.height });
    }

    /**
     * Remove every overlay on the cursor line
     */
    hideAtPoint(session: PreviewSession): void {
        const anchor = session.host.lineEndPosition();
        const remaining: OverlayRecord[] = [];
        for (const record of session.overlays) {
            if (record.anchorPosition === anchor) {
                record.handle.dispose();
            } else {
                remaining.push(record);
            }
        }
        session.overlays = remaining;
    }

    hideAll(session: PreviewSession): void {
        for (const record of session.overlays) {
            record.handle.dispose();
        }
        session.overlays = [];
    }

    toggle(session: PreviewSession): void {
        if (this.overlaysAtPoint(session).length > 0) {
            this.hideAtPoint(session);
        } else {
            this.show(session);
        }
    }

    /**
     * Cursor movement handler used in auto-preview mode.
     *
     * Restarts the debounce timer on every move. When the timer fires, the
     * file is looked up again at the cursor position of that moment, which
     * may differ from the line that scheduled it.
     */
    handleCursorMoved(session: PreviewSession): void {
        if (!session.autoModeEnabled) {
            return;
        }

        const { host } = session;
        const position = host.cursorPosition();
        if (position === session.lastCursorPosition) {
            return;
        }

        session.debounceHandle?.dispose();
        session.debounceHandle = host.scheduleDelayed(this.getConfig().delay, () => {
            session.debounceHandle = undefined;
            if (session.autoModeEnabled && host.resolveFileAtCursor()) {
                this.show(session);
            }
        });
        session.lastCursorPosition = position;
    }

    enableMode(session: PreviewSession): void {
        session.cursorSubscription?.dispose();
        session.cursorSubscription = undefined;
        session.debounceHandle?.dispose();
        session.debounceHandle = undefined;

        session.modeEnabled = true;
        session.autoModeEnabled = this.getConfig().autoPreviewMode;
        if (session.autoModeEnabled) {
            session.cursorSubscription = session.host.onCursorMoved(() => this.handleCursorMoved(session));
        }
        log.debug('Preview mode enabled', { autoPreview: session.autoModeEnabled });
    }

    disableMode(session: PreviewSession): void {
        session.cursorSubscription?.dispose();
        session.cursorSubscription = undefined;
        session.debounceHandle?.dispose();
        session.debounceHandle = undefined;

        session.modeEnabled = false;
        session.autoModeEnabled = false;
        this.hideAll(session);
        log.debug('Preview mode disabled');
    }

    toggleMode(session: PreviewSession): void {
        if (session.modeEnabled) {
            this.disableMode(session);
        } else {
            this.enableMode(session);
        }
    }
}
