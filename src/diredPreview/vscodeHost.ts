/**
 * VS Code host for the preview overlay manager.
 *
 * One host serves one listing document. Overlays are `after` decorations at
 * the end of the listing line, showing the image through `contentIconPath`.
 * An icon and a text cannot share one attachment, so the placeholder is not
 * drawn and the spacing becomes horizontal margins.
 */

import * as path from 'path';
import * as vscode from 'vscode';
import { createLogger } from '../utils/logger';
import { imageFilenamePattern, renderImageFile } from './imageRenderer';
import { resolveListingFile } from './listingParser';
import {
    Disposable,
    OverlayContent,
    PreviewConfig,
    PreviewHost,
    RenderConstraints,
    RenderedImage
} from './previewTypes';

const log = createLogger('DiredPreview').child('Host');

/**
 * Log a failed preview action and tell the user
 */
export function reportPreviewError(action: string, error: unknown): void {
    const err = error instanceof Error ? error : new Error(String(error));
    log.error(`${action} failed`, err);
    void vscode.window.showErrorMessage(`Dired preview: ${err.message}`);
}

export class VscodePreviewHost implements PreviewHost {
    // Live overlays, kept to decorate editors opened after the overlay
    private readonly decorations: Map<vscode.TextEditorDecorationType, vscode.Range> = new Map();

    constructor(
        private readonly document: vscode.TextDocument,
        private readonly getConfig: () => PreviewConfig
    ) {}

    private editors(): vscode.TextEditor[] {
        return vscode.window.visibleTextEditors.filter(editor => editor.document === this.document);
    }

    private cursor(): vscode.Position {
        const active = vscode.window.activeTextEditor;
        const editor = active?.document === this.document ? active : this.editors()[0];
        return editor?.selection.active ?? new vscode.Position(0, 0);
    }

    resolveFileAtCursor(): string | undefined {
        const lines = this.document.getText().split(/\r?\n/);
        const fallback = this.document.uri.scheme === 'file'
            ? path.dirname(this.document.uri.fsPath)
            : undefined;
        return resolveListingFile(lines, this.cursor().line, fallback);
    }

    cursorPosition(): number {
        return this.document.offsetAt(this.cursor());
    }

    lineEndPosition(): number {
        return this.document.offsetAt(this.document.lineAt(this.cursor().line).range.end);
    }

    isImageDisplaySupported(): boolean {
        // The web UI cannot load local files as decoration icons
        return vscode.env.uiKind !== vscode.UIKind.Web;
    }

    imageFilenamePattern(): RegExp {
        return imageFilenamePattern(this.getConfig().imageExtensions);
    }

    renderImage(file: string, formatHint: string, constraints: RenderConstraints): RenderedImage {
        return renderImageFile(file, formatHint, constraints);
    }

    createOverlay(position: number, content: OverlayContent): Disposable {
        const { image } = content;
        const decorationType = vscode.window.createTextEditorDecorationType({
            after: {
                contentIconPath: vscode.Uri.file(image.path),
                width: `${image.width}px`,
                height: `${image.height}px`,
                margin: `0 ${content.trailingSpacing}ch 0 ${content.leadingSpacing}ch`
            }
        });

        const anchor = this.document.positionAt(position);
        const range = new vscode.Range(anchor, anchor);
        this.decorations.set(decorationType, range);
        for (const editor of this.editors()) {
            editor.setDecorations(decorationType, [{ range }]);
        }

        return {
            dispose: () => {
                this.decorations.delete(decorationType);
                decorationType.dispose();
            }
        };
    }

    /**
     * Apply the live overlays to those of the editors that show this document.
     * VS Code creates a new editor without decorations when a tab is shown again.
     */
    restoreOverlays(editors: readonly vscode.TextEditor[]): void {
        const own = editors.filter(editor => editor.document === this.document);
        if (own.length === 0 || this.decorations.size === 0) {
            return;
        }

        for (const [decorationType, range] of this.decorations) {
            for (const editor of own) {
                editor.setDecorations(decorationType, [{ range }]);
            }
        }
        log.debug('Previews restored', { count: this.decorations.size, editors: own.length });
    }

    scheduleDelayed(seconds: number, callback: () => void): Disposable {
        const timer = setTimeout(() => {
            try {
                callback();
            } catch (error) {
                reportPreviewError('Automatic preview', error);
            }
        }, seconds * 1000);
        return { dispose: () => clearTimeout(timer) };
    }

    onCursorMoved(callback: () => void): Disposable {
        return vscode.window.onDidChangeTextEditorSelection(event => {
            if (event.textEditor.document === this.document) {
                callback();
            }
        });
    }
}
