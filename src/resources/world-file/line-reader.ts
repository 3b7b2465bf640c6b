/**
 * Thrown while parsing a world file. Never escapes parseWorld, which turns
 * it into a Format result.
 */
export class WorldFormatError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'WorldFormatError';
    }
}

/**
 * Reads a text document line by line and keeps the line number for error
 * messages. Accepts `\n`, `\r\n` and `\r` terminators; a single terminator
 * after the last line does not count as an extra line.
 */
export class LineReader {
    private readonly lines: string[];
    private next = 0;

    constructor(text: string) {
        this.lines = text.split(/\r\n|\r|\n/);
        if (this.lines[this.lines.length - 1] === '') {
            this.lines.pop();
        }
    }

    /** 1-based number of the line most recently read (0 before the first read) */
    public get lineNumber(): number {
        return this.next;
    }

    /** Number of lines not yet read */
    public get remaining(): number {
        return Math.max(this.lines.length - this.next, 0);
    }

    public fail(message: string): never {
        throw new WorldFormatError(`Error on line ${this.lineNumber}: ${message}`);
    }

    /** Read the next line, failing with `endMessage` at end of input */
    public readLine(endMessage = 'File ended abruptly'): string {
        if (this.next >= this.lines.length) {
            this.next++;
            this.fail(endMessage);
        }
        return this.lines[this.next++];
    }

    public readBlankLine(endMessage: string, notBlankMessage: string): void {
        if (this.readLine(endMessage) !== '') {
            this.fail(notBlankMessage);
        }
    }

    /** Fail with `message` when anything follows the current line */
    public expectEnd(message: string): void {
        if (this.next < this.lines.length) {
            this.next++;
            this.fail(message);
        }
    }
}
