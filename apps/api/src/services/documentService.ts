import mammoth from 'mammoth';
import { ExtractionError, UnsupportedFormatError } from '../utils/errors';
import { logExtraction } from '../utils/logger';

export type DocumentFormat = 'pdf' | 'docx';

export interface UploadedDocument {
    filename: string;
    buffer: Buffer;
}

export function detectDocumentFormat(filename: string): DocumentFormat {
    const name = filename.toLowerCase();
    if (name.endsWith('.pdf')) {
        return 'pdf';
    }
    if (name.endsWith('.docx')) {
        return 'docx';
    }
    throw new UnsupportedFormatError(filename);
}

/**
 * One line per page that has text. Pages without text are skipped entirely.
 */
export async function extractPdfText(buffer: Buffer): Promise<string> {
    // unpdf pulls in pdf.js; load it on first use only
    const { extractText } = await import('unpdf');
    const result = await extractText(new Uint8Array(buffer), { mergePages: false });

    let text = '';
    for (const pageText of result.text) {
        if (pageText) {
            text += `${pageText}\n`;
        }
    }
    return text;
}

interface DocxNode {
    type?: unknown;
    value?: unknown;
    children?: unknown;
}

function isDocxNode(value: unknown): value is DocxNode {
    return typeof value === 'object' && value !== null;
}

function childrenOf(node: DocxNode): unknown[] {
    return Array.isArray(node.children) ? node.children : [];
}

// Text of one paragraph: runs, hyperlinks and the like are flattened; breaks become newlines
function paragraphText(node: unknown): string {
    if (!isDocxNode(node)) {
        return '';
    }
    switch (node.type) {
        case 'text':
            return typeof node.value === 'string' ? node.value : '';
        case 'tab':
            return '\t';
        case 'break':
            return '\n';
        default:
            return childrenOf(node).map(paragraphText).join('');
    }
}

/**
 * Body paragraphs joined by newlines; empty paragraphs stay as blank lines.
 * Paragraphs inside tables are not part of the body and are left out.
 */
export async function extractDocxText(buffer: Buffer): Promise<string> {
    const paragraphs: string[] = [];
    // The HTML output is discarded; mammoth is only used to read the document tree
    await mammoth.convertToHtml({ buffer }, {
        transformDocument: (document: unknown) => {
            if (isDocxNode(document)) {
                for (const child of childrenOf(document)) {
                    if (isDocxNode(child) && child.type === 'paragraph') {
                        paragraphs.push(paragraphText(child));
                    }
                }
            }
            return document;
        },
    });
    return paragraphs.join('\n');
}

const extractors: Record<DocumentFormat, (buffer: Buffer) => Promise<string>> = {
    pdf: extractPdfText,
    docx: extractDocxText,
};

export async function extractResumeText(document: UploadedDocument): Promise<string> {
    const format = detectDocumentFormat(document.filename);
    logExtraction(format, 'start', { size: document.buffer.length });

    let text: string;
    try {
        text = await extractors[format](document.buffer);
    } catch (error) {
        const message = error instanceof Error ? error.message : 'Unknown error';
        logExtraction(format, 'error', { error: message });
        throw new ExtractionError(`Failed to parse ${format.toUpperCase()} file: ${message}`, format);
    }

    logExtraction(format, 'success', { length: text.length });
    return text;
}
