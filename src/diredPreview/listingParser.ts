/**
 * Listing Parser
 * Finds the file named on a line of a dired-style (`ls -l`) listing
 */

import * as os from 'os';
import * as path from 'path';

export type ListingEntryType = 'file' | 'directory' | 'symlink' | 'other';

export interface ListingEntry {
    /** Mark column character, ' ' when unmarked */
    mark: string;
    type: ListingEntryType;
    name: string;
    /** Target of a symlink entry */
    symlinkTarget?: string;
}

// [mark] perms links owner [group] size date name
// e.g. "* -rw-r--r--  1 alice staff 2048 Mar  3 09:15 photo.png"
const LISTING_LINE_PATTERN = new RegExp(
    '^(?<mark>[ *DC])?\\s*' +
    '(?<type>[-dlbcps])[-rwxsStT]{9}[.+@]?\\s+' +
    '\\d+\\s+' +
    '(?:\\S+\\s+){1,2}' +
    '[\\d.,]+[BKMGTP]?\\s+' +
    '(?:[A-Z][a-z]{2}\\s+\\d{1,2}\\s+(?:\\d{1,2}:\\d{2}|\\d{4})|\\d{4}-\\d{2}-\\d{2}(?:\\s+\\d{2}:\\d{2})?)' +
    '\\s(?<name>.+)$'
);

// "  /home/alice/pictures:" or "  ~/pictures:"
const HEADER_LINE_PATTERN = /^\s*(?<dir>(?:\/|~|[A-Za-z]:[\\/]).*):\s*$/;

const ENTRY_TYPES: Record<string, ListingEntryType> = {
    '-': 'file',
    'd': 'directory',
    'l': 'symlink'
};

export function parseListingLine(line: string): ListingEntry | undefined {
    const groups = LISTING_LINE_PATTERN.exec(line)?.groups;
    if (!groups) {
        return undefined;
    }

    const type = ENTRY_TYPES[groups.type] ?? 'other';
    let name = groups.name;
    let symlinkTarget: string | undefined;

    if (type === 'symlink') {
        const arrow = name.indexOf(' -> ');
        if (arrow >= 0) {
            symlinkTarget = name.slice(arrow + 4);
            name = name.slice(0, arrow);
        }
    }

    return {
        mark: groups.mark ?? ' ',
        type,
        name,
        symlinkTarget
    };
}

/**
 * Directory of the nearest header at or above a line
 */
export function findListingDirectory(lines: readonly string[], lineIndex: number): string | undefined {
    for (let i = Math.min(lineIndex, lines.length - 1); i >= 0; i--) {
        const dir = HEADER_LINE_PATTERN.exec(lines[i])?.groups?.dir;
        if (dir) {
            return dir.startsWith('~') ? path.join(os.homedir(), dir.slice(1)) : dir;
        }
    }
    return undefined;
}

/**
 * Full path of the file named on a listing line.
 * Directories, `.` and `..` do not resolve to a file.
 */
export function resolveListingFile(
    lines: readonly string[],
    lineIndex: number,
    fallbackDirectory?: string
): string | undefined {
    if (lineIndex < 0 || lineIndex >= lines.length) {
        return undefined;
    }

    const entry = parseListingLine(lines[lineIndex]);
    if (!entry || entry.type === 'directory' || entry.name === '.' || entry.name === '..') {
        return undefined;
    }

    const directory = findListingDirectory(lines, lineIndex) ?? fallbackDirectory;
    if (!directory) {
        return undefined;
    }
    return path.join(directory, entry.name);
}
