export class UpstreamError extends Error {
    public code: string;
    public statusCode?: number;
    public suggestModelChange: boolean;

    constructor(message: string, code: string, statusCode?: number, suggestModelChange: boolean = true) {
        super(message);
        this.name = 'UpstreamError';
        this.code = code;
        this.statusCode = statusCode;
        this.suggestModelChange = suggestModelChange;
    }
}

export class UpstreamStatusError extends UpstreamError {
    public body?: string;
    constructor(statusCode: number, body?: string) {
        super(`Model request failed with status ${statusCode}`, 'UPSTREAM_STATUS', statusCode);
        this.name = 'UpstreamStatusError';
        this.body = body;
    }
}

export class UpstreamNetworkError extends UpstreamError {
    constructor(cause: string, code: string = 'NETWORK_ERROR') {
        super(`Network error: ${cause}`, code);
        this.name = 'UpstreamNetworkError';
    }
}

export class TimeoutError extends UpstreamNetworkError {
    public timeoutMs: number;
    constructor(timeoutMs: number) {
        super(`request timed out after ${timeoutMs}ms`, 'TIMEOUT');
        this.name = 'TimeoutError';
        this.timeoutMs = timeoutMs;
    }
}

export class ParseError extends UpstreamError {
    public raw: string;
    constructor(message: string, raw: string) {
        super(message, 'PARSE_ERROR');
        this.name = 'ParseError';
        this.raw = raw;
    }
}

export class UnsupportedFormatError extends Error {
    public statusCode = 400;
    public filename: string;
    constructor(filename: string) {
        super('Unsupported file format. Only PDF or DOCX allowed.');
        this.name = 'UnsupportedFormatError';
        this.filename = filename;
    }
}

export class ExtractionError extends Error {
    public format: string;
    constructor(message: string, format: string) {
        super(message);
        this.name = 'ExtractionError';
        this.format = format;
    }
}
