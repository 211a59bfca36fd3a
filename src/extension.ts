import * as vscode from 'vscode';
import { registerDiredPreviewCommands } from './diredPreview';
import { createLogger, initializeLogging } from './utils/logger';

const log = createLogger('Extension');

export function activate(context: vscode.ExtensionContext): void {
    initializeLogging(context);

    // Sessions are disabled when the controller in context.subscriptions is disposed
    registerDiredPreviewCommands(context);

    log.info('Dired Preview activated');
}

export function deactivate(): void {}
