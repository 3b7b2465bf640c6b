import { describe, it, expect } from 'vitest';
import { LineReader, WorldFormatError } from '@/resources/world-file';

describe('LineReader', () => {
    it('should count lines as they are read', () => {
        const reader = new LineReader('a\r\nb\rc\n');
        expect(reader.lineNumber).toBe(0);
        expect(reader.readLine()).toBe('a');
        expect(reader.readLine()).toBe('b');
        expect(reader.readLine()).toBe('c');
        expect(reader.lineNumber).toBe(3);
        reader.expectEnd('unexpected');
    });

    it('should name the line that is missing at end of input', () => {
        const reader = new LineReader('only\n');
        reader.readLine();
        expect(() => reader.readLine('Ran out')).toThrow(new WorldFormatError('Error on line 2: Ran out'));
    });

    it('should count the lines left to read', () => {
        const reader = new LineReader('a\nb\n');
        expect(reader.remaining).toBe(2);
        reader.readLine();
        expect(reader.remaining).toBe(1);
        reader.readLine();
        expect(reader.remaining).toBe(0);
        expect(() => reader.readLine()).toThrow('Error on line 3: File ended abruptly');
        expect(reader.remaining).toBe(0);
    });

    it('should check blank lines', () => {
        const reader = new LineReader('\nx\n');
        reader.readBlankLine('end', 'not blank');
        expect(() => reader.readBlankLine('end', 'not blank')).toThrow('Error on line 2: not blank');
    });

    it('should treat a second trailing terminator as an extra line', () => {
        const reader = new LineReader('a\n\n');
        reader.readLine();
        expect(() => reader.expectEnd('Extra content in file')).toThrow('Error on line 2: Extra content in file');
    });
});
