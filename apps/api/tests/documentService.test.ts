import { beforeEach, describe, expect, it, vi } from 'vitest';
import {
    detectDocumentFormat,
    extractDocxText,
    extractPdfText,
    extractResumeText,
} from '../src/services/documentService';
import { ExtractionError, UnsupportedFormatError } from '../src/utils/errors';
import { EMPTY_PARAGRAPH, LINE_BREAK, buildDocx, paragraph, text } from './helpers/docx';

const { extractText } = vi.hoisted(() => ({
    extractText: vi.fn(),
}));

vi.mock('unpdf', () => ({ extractText }));

const fileBytes = Buffer.from('file bytes');

beforeEach(() => {
    extractText.mockReset();
});

describe('detectDocumentFormat', () => {
    it('matches extensions case-insensitively', () => {
        expect(detectDocumentFormat('resume.PDF')).toBe('pdf');
        expect(detectDocumentFormat('Resume.Final.pdf')).toBe('pdf');
        expect(detectDocumentFormat('resume.docx')).toBe('docx');
        expect(detectDocumentFormat('RESUME.DOCX')).toBe('docx');
    });

    it('rejects anything else', () => {
        expect(() => detectDocumentFormat('resume.txt')).toThrow(UnsupportedFormatError);
        expect(() => detectDocumentFormat('resume.doc')).toThrow('Unsupported file format. Only PDF or DOCX allowed.');
        expect(() => detectDocumentFormat('resume.pdf.zip')).toThrow(UnsupportedFormatError);
    });
});

describe('extractPdfText', () => {
    it('skips pages without text', async () => {
        extractText.mockResolvedValue({ totalPages: 2, text: ['A', ''] });

        await expect(extractPdfText(fileBytes)).resolves.toBe('A\n');
        expect(extractText).toHaveBeenCalledWith(new Uint8Array(fileBytes), { mergePages: false });
    });

    it('ends every page with a newline', async () => {
        extractText.mockResolvedValue({ totalPages: 3, text: ['First page', '', 'Third page'] });
        await expect(extractPdfText(fileBytes)).resolves.toBe('First page\nThird page\n');
    });

    it('returns an empty string for a PDF without text', async () => {
        extractText.mockResolvedValue({ totalPages: 1, text: [''] });
        await expect(extractPdfText(fileBytes)).resolves.toBe('');
    });
});

describe('extractDocxText', () => {
    it('joins paragraphs with single newlines', async () => {
        const docx = await buildDocx(paragraph(text('Jane Doe')) + paragraph(text('Senior Engineer')));
        await expect(extractDocxText(docx)).resolves.toBe('Jane Doe\nSenior Engineer');
    });

    it('keeps empty paragraphs as blank lines', async () => {
        const docx = await buildDocx(paragraph(text('A')) + EMPTY_PARAGRAPH + paragraph(text('B')));
        await expect(extractDocxText(docx)).resolves.toBe('A\n\nB');
    });

    it('keeps a trailing line break apart from the empty paragraphs after it', async () => {
        const docx = await buildDocx(
            paragraph(text('A') + LINE_BREAK) + EMPTY_PARAGRAPH + EMPTY_PARAGRAPH + paragraph(text('B'))
        );
        await expect(extractDocxText(docx)).resolves.toBe('A\n\n\n\nB');
    });

    it('turns line breaks inside a paragraph into newlines', async () => {
        const docx = await buildDocx(
            paragraph(text('A') + LINE_BREAK + LINE_BREAK + text('B')) + paragraph(text('C'))
        );
        await expect(extractDocxText(docx)).resolves.toBe('A\n\nB\nC');
    });

    it('concatenates runs and keeps tabs', async () => {
        const docx = await buildDocx(paragraph(text('Skills:'), '<w:tab/>', text('TypeScript')));
        await expect(extractDocxText(docx)).resolves.toBe('Skills:\tTypeScript');
    });

    it('leaves out paragraphs inside tables', async () => {
        const table = `<w:tbl><w:tr><w:tc>${paragraph(text('Cell'))}</w:tc></w:tr></w:tbl>`;
        const docx = await buildDocx(paragraph(text('Intro')) + table + paragraph(text('Outro')));
        await expect(extractDocxText(docx)).resolves.toBe('Intro\nOutro');
    });

    it('returns an empty string for an empty document', async () => {
        const docx = await buildDocx('');
        await expect(extractDocxText(docx)).resolves.toBe('');
    });
});

describe('extractResumeText', () => {
    it('routes by file extension', async () => {
        extractText.mockResolvedValue({ totalPages: 1, text: ['from pdf'] });
        const docx = await buildDocx(paragraph(text('from docx')));

        await expect(extractResumeText({ filename: 'resume.PDF', buffer: fileBytes })).resolves.toBe('from pdf\n');
        await expect(extractResumeText({ filename: 'resume.docx', buffer: docx })).resolves.toBe('from docx');
        expect(extractText).toHaveBeenCalledTimes(1);
    });

    it('rejects unsupported files before parsing', async () => {
        await expect(extractResumeText({ filename: 'resume.txt', buffer: fileBytes })).rejects.toBeInstanceOf(
            UnsupportedFormatError
        );
        expect(extractText).not.toHaveBeenCalled();
    });

    it('wraps parser failures', async () => {
        extractText.mockRejectedValue(new Error('Invalid PDF structure'));

        const error = await extractResumeText({ filename: 'broken.pdf', buffer: fileBytes }).catch((err: unknown) => err);

        expect(error).toBeInstanceOf(ExtractionError);
        expect(error).toMatchObject({
            message: 'Failed to parse PDF file: Invalid PDF structure',
            format: 'pdf',
        });
    });

    it('wraps failures to read a .docx', async () => {
        const error = await extractResumeText({ filename: 'broken.docx', buffer: fileBytes }).catch((err: unknown) => err);

        expect(error).toBeInstanceOf(ExtractionError);
        expect(error).toMatchObject({ format: 'docx' });
        expect(error).toHaveProperty('message', expect.stringMatching(/^Failed to parse DOCX file: /));
    });
});
