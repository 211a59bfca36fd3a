/**
 * Dired Preview Commands
 * VS Code command registrations and per-document session bookkeeping
 */

import * as vscode from 'vscode';
import { createLogger, getLoggingService } from '../utils/logger';
import {
    CONFIG_SECTION,
    ListingConfig,
    loadListingConfig,
    loadPreviewConfig
} from './previewConfig';
import { createPreviewSession, PreviewOverlayManager } from './previewManager';
import { PreviewConfig, PreviewSession } from './previewTypes';
import { reportPreviewError, VscodePreviewHost } from './vscodeHost';

const log = createLogger('DiredPreview');

interface SessionEntry {
    session: PreviewSession;
    host: VscodePreviewHost;
}

/**
 * Owns one PreviewSession per listing document
 */
export class DiredPreviewController implements vscode.Disposable {
    readonly manager: PreviewOverlayManager;
    private sessions: Map<string, SessionEntry> = new Map();
    private config: PreviewConfig;
    private listingConfig: ListingConfig;
    private disposables: vscode.Disposable[] = [];

    constructor() {
        this.config = loadPreviewConfig();
        this.listingConfig = loadListingConfig();
        this.manager = new PreviewOverlayManager(() => this.config);
        this.registerEventHandlers();
    }

    private registerEventHandlers(): void {
        this.disposables.push(
            vscode.workspace.onDidChangeConfiguration((e: vscode.ConfigurationChangeEvent) => {
                if (e.affectsConfiguration(CONFIG_SECTION)) {
                    this.config = loadPreviewConfig();
                    this.listingConfig = loadListingConfig();
                    // Pick up a changed autoPreviewMode
                    for (const { session } of this.sessions.values()) {
                        if (session.modeEnabled) {
                            this.manager.enableMode(session);
                        }
                    }
                }
            })
        );

        this.disposables.push(
            vscode.workspace.onDidCloseTextDocument((document: vscode.TextDocument) => {
                const key = document.uri.toString();
                const entry = this.sessions.get(key);
                if (entry) {
                    this.manager.disableMode(entry.session);
                    this.sessions.delete(key);
                }
            })
        );

        // Anchor offsets do not survive an edit of the listing
        this.disposables.push(
            vscode.workspace.onDidChangeTextDocument((e: vscode.TextDocumentChangeEvent) => {
                if (e.contentChanges.length === 0) {
                    return;
                }
                const entry = this.sessions.get(e.document.uri.toString());
                if (entry && entry.session.overlays.length > 0) {
                    this.manager.hideAll(entry.session);
                    log.debug('Previews cleared after edit', { document: e.document.uri.toString() });
                }
            })
        );

        this.disposables.push(
            vscode.window.onDidChangeVisibleTextEditors((editors: readonly vscode.TextEditor[]) => {
                for (const { host } of this.sessions.values()) {
                    host.restoreOverlays(editors);
                }
            })
        );

        this.disposables.push(
            vscode.window.onDidChangeActiveTextEditor((editor: vscode.TextEditor | undefined) => {
                this.enableOnOpen(editor);
            })
        );
    }

    isListing(document: vscode.TextDocument): boolean {
        return this.listingConfig.listingLanguages.includes(document.languageId);
    }

    getSession(document: vscode.TextDocument): PreviewSession {
        const key = document.uri.toString();
        let entry = this.sessions.get(key);
        if (!entry) {
            const host = new VscodePreviewHost(document, () => this.config);
            entry = { session: createPreviewSession(host), host };
            this.sessions.set(key, entry);
        }
        return entry.session;
    }

    /**
     * Turn the mode on for a listing that just became active, if configured
     */
    enableOnOpen(editor: vscode.TextEditor | undefined): void {
        if (!editor || !this.listingConfig.enableOnOpen || !this.isListing(editor.document)) {
            return;
        }
        const session = this.getSession(editor.document);
        if (!session.modeEnabled) {
            this.manager.enableMode(session);
            log.info('Preview mode enabled on open', { document: editor.document.uri.toString() });
        }
    }

    /**
     * Run an operation on the active editor's session, reporting failures
     */
    run(action: string, operation: (session: PreviewSession) => void): void {
        const editor = vscode.window.activeTextEditor;
        if (!editor) {
            void vscode.window.showWarningMessage('No active listing');
            return;
        }

        try {
            operation(this.getSession(editor.document));
        } catch (error) {
            reportPreviewError(action, error);
        }
    }

    dispose(): void {
        for (const { session } of this.sessions.values()) {
            this.manager.disableMode(session);
        }
        this.sessions.clear();

        for (const disposable of this.disposables) {
            disposable.dispose();
        }
        this.disposables = [];
    }
}

export function registerDiredPreviewCommands(context: vscode.ExtensionContext): DiredPreviewController {
    const controller = new DiredPreviewController();
    const manager = controller.manager;
    context.subscriptions.push(controller);

    context.subscriptions.push(
        vscode.commands.registerCommand('diredPreview.show', () => {
            controller.run('Show preview', session => manager.show(session));
        }),

        vscode.commands.registerCommand('diredPreview.hideAtPoint', () => {
            controller.run('Hide preview', session => manager.hideAtPoint(session));
        }),

        vscode.commands.registerCommand('diredPreview.hideAll', () => {
            controller.run('Hide all previews', session => manager.hideAll(session));
        }),

        vscode.commands.registerCommand('diredPreview.toggle', () => {
            controller.run('Toggle preview', session => manager.toggle(session));
        }),

        vscode.commands.registerCommand('diredPreview.enableMode', () => {
            controller.run('Enable preview mode', session => manager.enableMode(session));
        }),

        vscode.commands.registerCommand('diredPreview.disableMode', () => {
            controller.run('Disable preview mode', session => manager.disableMode(session));
        }),

        vscode.commands.registerCommand('diredPreview.toggleMode', () => {
            controller.run('Toggle preview mode', session => manager.toggleMode(session));
        }),

        vscode.commands.registerCommand('diredPreview.showLog', () => {
            getLoggingService().show();
        })
    );

    controller.enableOnOpen(vscode.window.activeTextEditor);
    return controller;
}
