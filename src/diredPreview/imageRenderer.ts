/**
 * Image Renderer
 * Reads the pixel size of an image from its header and scales it for display.
 *
 * Decoding stops at the header: VS Code draws the file itself, we only need
 * to know how large the preview should be.
 */

import * as fs from 'fs';
import { ImageDecodeError, RenderConstraints, RenderedImage } from './previewTypes';

export interface ImageSize {
    width: number;
    height: number;
}

type HeaderReader = (data: Buffer) => ImageSize | undefined;

function readPng(data: Buffer): ImageSize | undefined {
    // Signature, then the IHDR chunk: width at bytes 16-19, height at 20-23
    if (data.length < 24 || data.readUInt32BE(0) !== 0x89504e47 || data.toString('ascii', 12, 16) !== 'IHDR') {
        return undefined;
    }
    return { width: data.readUInt32BE(16), height: data.readUInt32BE(20) };
}

function readGif(data: Buffer): ImageSize | undefined {
    if (data.length < 10 || data.toString('ascii', 0, 4) !== 'GIF8') {
        return undefined;
    }
    return { width: data.readUInt16LE(6), height: data.readUInt16LE(8) };
}

function readBmp(data: Buffer): ImageSize | undefined {
    if (data.length < 26 || data.toString('ascii', 0, 2) !== 'BM') {
        return undefined;
    }
    // Negative height means a top-down bitmap
    return { width: Math.abs(data.readInt32LE(18)), height: Math.abs(data.readInt32LE(22)) };
}

function isStartOfFrame(marker: number): boolean {
    return marker >= 0xc0 && marker <= 0xcf && marker !== 0xc4 && marker !== 0xc8 && marker !== 0xcc;
}

function readJpeg(data: Buffer): ImageSize | undefined {
    if (data.length < 4 || data[0] !== 0xff || data[1] !== 0xd8) {
        return undefined;
    }

    let offset = 2;
    while (offset + 3 < data.length) {
        if (data[offset] !== 0xff) {
            return undefined;
        }
        const marker = data[offset + 1];
        if (marker === 0xff) {
            // Fill byte
            offset++;
            continue;
        }
        if (marker === 0x01 || (marker >= 0xd0 && marker <= 0xd9)) {
            offset += 2;
            continue;
        }
        if (isStartOfFrame(marker)) {
            if (offset + 9 > data.length) {
                return undefined;
            }
            return { width: data.readUInt16BE(offset + 7), height: data.readUInt16BE(offset + 5) };
        }
        offset += 2 + data.readUInt16BE(offset + 2);
    }
    return undefined;
}

function readWebp(data: Buffer): ImageSize | undefined {
    if (data.length < 30 || data.toString('ascii', 0, 4) !== 'RIFF' || data.toString('ascii', 8, 12) !== 'WEBP') {
        return undefined;
    }

    switch (data.toString('ascii', 12, 16)) {
        case 'VP8 ':
            return { width: data.readUInt16LE(26) & 0x3fff, height: data.readUInt16LE(28) & 0x3fff };
        case 'VP8L': {
            const bits = data.readUInt32LE(21);
            return { width: (bits & 0x3fff) + 1, height: ((bits >> 14) & 0x3fff) + 1 };
        }
        case 'VP8X':
            return { width: data.readUIntLE(24, 3) + 1, height: data.readUIntLE(27, 3) + 1 };
        default:
            return undefined;
    }
}

function svgAttribute(tag: string, name: string): string | undefined {
    const match = new RegExp(`\\s${name}\\s*=\\s*["']([^"']*)["']`).exec(tag);
    return match?.[1];
}

function svgLength(value: string | undefined): number | undefined {
    if (!value) {
        return undefined;
    }
    // Only absolute lengths; percentages depend on the viewport
    const match = /^\s*(\d+(?:\.\d+)?)\s*(?:px)?\s*$/.exec(value);
    if (!match) {
        return undefined;
    }
    const length = parseFloat(match[1]);
    return length > 0 ? length : undefined;
}

function readSvg(data: Buffer): ImageSize | undefined {
    const tag = /<svg\b[^>]*>/i.exec(data.toString('utf8'))?.[0];
    if (!tag) {
        return undefined;
    }

    const width = svgLength(svgAttribute(tag, 'width'));
    const height = svgLength(svgAttribute(tag, 'height'));
    if (width && height) {
        return { width, height };
    }

    const viewBox = svgAttribute(tag, 'viewBox')?.trim().split(/[\s,]+/).map(Number);
    if (viewBox && viewBox.length === 4 && viewBox[2] > 0 && viewBox[3] > 0) {
        return { width: viewBox[2], height: viewBox[3] };
    }
    return undefined;
}

function readTiff(data: Buffer): ImageSize | undefined {
    if (data.length < 8) {
        return undefined;
    }
    const byteOrder = data.toString('ascii', 0, 2);
    if (byteOrder !== 'II' && byteOrder !== 'MM') {
        return undefined;
    }
    const littleEndian = byteOrder === 'II';
    const u16 = (offset: number) => littleEndian ? data.readUInt16LE(offset) : data.readUInt16BE(offset);
    const u32 = (offset: number) => littleEndian ? data.readUInt32LE(offset) : data.readUInt32BE(offset);

    if (u16(2) !== 42) {
        return undefined;
    }
    const ifd = u32(4);
    if (ifd + 2 > data.length) {
        return undefined;
    }

    let width = 0;
    let height = 0;
    const count = u16(ifd);
    for (let i = 0; i < count; i++) {
        const entry = ifd + 2 + i * 12;
        if (entry + 12 > data.length) {
            break;
        }
        const tag = u16(entry);
        // Type 3 is SHORT, otherwise LONG
        const value = u16(entry + 2) === 3 ? u16(entry + 8) : u32(entry + 8);
        if (tag === 256) {
            width = value;
        } else if (tag === 257) {
            height = value;
        }
    }
    return width > 0 && height > 0 ? { width, height } : undefined;
}

function readIco(data: Buffer): ImageSize | undefined {
    if (data.length < 22 || data.readUInt16LE(0) !== 0) {
        return undefined;
    }
    const type = data.readUInt16LE(2);
    if ((type !== 1 && type !== 2) || data.readUInt16LE(4) === 0) {
        return undefined;
    }
    // First directory entry; 0 stands for 256
    return { width: data[6] || 256, height: data[7] || 256 };
}

const HEADER_READERS = new Map<string, HeaderReader>([
    ['png', readPng],
    ['jpeg', readJpeg],
    ['jpg', readJpeg],
    ['gif', readGif],
    ['bmp', readBmp],
    ['webp', readWebp],
    ['svg', readSvg],
    ['tiff', readTiff],
    ['tif', readTiff],
    ['ico', readIco],
    ['cur', readIco]
]);

/**
 * Read the natural size of an image from its header
 */
export function readImageSize(data: Buffer, formatHint: string): ImageSize | undefined {
    return HEADER_READERS.get(formatHint)?.(data);
}

/**
 * Apply the scale factor, then the optional caps, keeping the aspect ratio
 */
export function scaleToFit(size: ImageSize, constraints: RenderConstraints): ImageSize {
    let width = size.width * constraints.scale;
    let height = size.height * constraints.scale;

    if (constraints.maxWidth && width > constraints.maxWidth) {
        height = height * constraints.maxWidth / width;
        width = constraints.maxWidth;
    }
    if (constraints.maxHeight && height > constraints.maxHeight) {
        width = width * constraints.maxHeight / height;
        height = constraints.maxHeight;
    }

    return {
        width: Math.max(1, Math.round(width)),
        height: Math.max(1, Math.round(height))
    };
}

/**
 * Size an image file for display
 * @throws ImageDecodeError if the file cannot be read or is not a valid image of that format
 */
export function renderImageFile(file: string, formatHint: string, constraints: RenderConstraints): RenderedImage {
    if (!HEADER_READERS.has(formatHint)) {
        throw new ImageDecodeError(file, `unsupported format '${formatHint}'`);
    }

    let data: Buffer;
    try {
        data = fs.readFileSync(file);
    } catch (error) {
        throw new ImageDecodeError(file, error instanceof Error ? error.message : String(error));
    }

    const size = readImageSize(data, formatHint);
    if (!size || size.width <= 0 || size.height <= 0) {
        throw new ImageDecodeError(file, `not a valid ${formatHint} image`);
    }

    return { path: file, format: formatHint, ...scaleToFit(size, constraints) };
}

function escapeRegExp(text: string): string {
    return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Case-insensitive recognizer for file names ending in one of the extensions
 */
export function imageFilenamePattern(extensions: readonly string[]): RegExp {
    if (extensions.length === 0) {
        return /(?!)/;
    }
    const alternatives = extensions.map(escapeRegExp).join('|');
    return new RegExp(`\\.(?:${alternatives})$`, 'i');
}
