/**
 * Dired Preview configuration, read from the `diredPreview.*` settings
 */

import * as vscode from 'vscode';
import { DEFAULT_PREVIEW_CONFIG, PreviewConfig } from './previewTypes';

export const CONFIG_SECTION = 'diredPreview';

/**
 * Settings used by the command layer rather than the preview manager
 */
export interface ListingConfig {
    /** Language ids treated as listings */
    listingLanguages: string[];
    /** Turn the mode on when a listing becomes active */
    enableOnOpen: boolean;
}

/** Unset, zero and negative caps all mean "no cap" */
function optionalCap(value: number | null | undefined): number | undefined {
    return typeof value === 'number' && value > 0 ? value : undefined;
}

export function loadPreviewConfig(): PreviewConfig {
    const config = vscode.workspace.getConfiguration(CONFIG_SECTION);
    const defaults = DEFAULT_PREVIEW_CONFIG;
    return {
        scale: config.get<number>('scale', defaults.scale),
        delay: config.get<number>('delay', defaults.delay),
        spacing: config.get<number>('spacing', defaults.spacing),
        autoRemove: config.get<boolean>('autoRemove', defaults.autoRemove),
        maxWidth: optionalCap(config.get<number | null>('maxWidth', null)),
        maxHeight: optionalCap(config.get<number | null>('maxHeight', null)),
        autoPreviewMode: config.get<boolean>('autoPreviewMode', defaults.autoPreviewMode),
        excludedExtensions: config.get<string[]>('excludedExtensions', defaults.excludedExtensions),
        imageExtensions: config.get<string[]>('imageExtensions', defaults.imageExtensions),
        excludePatterns: config.get<string[]>('excludePatterns', defaults.excludePatterns)
    };
}

export function loadListingConfig(): ListingConfig {
    const config = vscode.workspace.getConfiguration(CONFIG_SECTION);
    return {
        listingLanguages: config.get<string[]>('listingLanguages', ['dired']),
        enableOnOpen: config.get<boolean>('enableOnOpen', false)
    };
}
