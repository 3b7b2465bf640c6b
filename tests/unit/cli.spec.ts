import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { access, mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { Readable } from 'stream';
import { ExitCode, USAGE, lineWriter, runCli } from '@/cli';
import { worldSettings } from '@/game/world-settings';
import { LogHandler } from '@/utilities/log-handler';
import { SAMPLE_WORLD_TEXT } from './helpers/test-world';

describe('runCli', () => {
    let dir: string;
    let mapPath: string;
    let outPath: string;
    let output: string[];
    let logged: string[];

    function run(args: string[], stdinLines: string[] = []): Promise<ExitCode> {
        return runCli(args, {
            output: line => output.push(line),
            stdin: Readable.from(stdinLines),
        });
    }

    async function writeActions(text: string): Promise<string> {
        const path = join(dir, 'actions.txt');
        await writeFile(path, text, 'utf-8');
        return path;
    }

    beforeEach(async() => {
        dir = await mkdtemp(join(tmpdir(), 'block-world-cli-'));
        mapPath = join(dir, 'in.txt');
        outPath = join(dir, 'out.txt');
        await writeFile(mapPath, SAMPLE_WORLD_TEXT, 'utf-8');

        output = [];
        logged = [];
        worldSettings.state.lineSeparator = 'lf';
        const manager = LogHandler.getLogManager();
        manager.clear();
        manager.setSink((_type, line) => logged.push(line));
    });

    afterEach(async() => {
        worldSettings.resetToDefaults();
        LogHandler.getLogManager().setSink(null);
        await rm(dir, { recursive: true, force: true });
    });

    it('should apply actions and save the world', async() => {
        const actions = await writeActions('MOVE_BUILDER north\nDIG\n');

        expect(await run([mapPath, actions, outPath])).toBe(ExitCode.Success);
        expect(output).toEqual(['Moved builder north', 'Top block on current tile removed']);
        expect(await readFile(outPath, 'utf-8')).toBe([
            '3',
            '4',
            'Bob',
            'wood,soil,wood',
            '',
            'total:3',
            '0 soil,soil,grass',
            '1 soil,soil,grass',
            '2 soil,stone',
            '',
            'exits',
            '0 east:2,north:1',
            '1 south:0',
            '2 west:0',
            '',
        ].join('\n'));
    });

    it('should read actions from stdin for the sentinel', async() => {
        expect(await run([mapPath, '-', outPath], ['DIG\n'])).toBe(ExitCode.Success);
        expect(output).toEqual(['Top block on current tile removed']);

        const saved = await readFile(outPath, 'utf-8');
        expect(saved.split('\n')[6]).toBe('0 soil,soil');
    });

    it('should honour a configured stdin sentinel', async() => {
        worldSettings.state.stdinSentinel = 'System.in';
        expect(await run([mapPath, 'System.in', outPath], ['MOVE_BUILDER east\n'])).toBe(ExitCode.Success);
        expect(output).toEqual(['Moved builder east']);
    });

    it('should exit with the usage code for a wrong argument count', async() => {
        expect(await run([mapPath, '-'])).toBe(ExitCode.Usage);
        expect(logged).toEqual([`ERROR\tCli\t${USAGE}`]);
    });

    it('should exit with the map code when the map cannot be loaded', async() => {
        const missing = join(dir, 'missing.txt');
        expect(await run([missing, '-', outPath])).toBe(ExitCode.MapLoad);
        expect(logged).toContain(`ERROR\tCli\tFile not found: ${missing}`);
    });

    it('should exit with the map code for a malformed map', async() => {
        await writeFile(mapPath, 'x\n', 'utf-8');
        expect(await run([mapPath, '-', outPath])).toBe(ExitCode.MapLoad);
        expect(logged).toContain('ERROR\tCli\tError on line 1: Invalid integer for starting position x');
    });

    it('should exit with the action source code when the actions cannot be opened', async() => {
        expect(await run([mapPath, join(dir, 'no-actions.txt'), outPath])).toBe(ExitCode.ActionSource);
        await expect(access(outPath)).rejects.toThrow();
    });

    it('should exit with the action source code when the actions cannot be read', async() => {
        expect(await run([mapPath, dir, outPath])).toBe(ExitCode.ActionSource);
        expect(logged.map(line => line.split('\n')[0])).toContain(`ERROR\tCli\tCannot read action source ${dir}`);
        await expect(access(outPath)).rejects.toThrow();
    });

    it('should exit with the parse code and not save after a bad action line', async() => {
        const actions = await writeActions('MOVE_BUILDER north\nDIG\nDROP 0\nFROBNICATE\nDIG\n');

        expect(await run([mapPath, actions, outPath])).toBe(ExitCode.ActionParse);
        expect(output).toEqual([
            'Moved builder north',
            'Top block on current tile removed',
            'Dropped a block from inventory',
        ]);
        expect(logged).toContain('ERROR\tCli\tError on line 4: Unrecognised action given');
        await expect(access(outPath)).rejects.toThrow();
    });

    it('should exit with the save code when the output cannot be written', async() => {
        const actions = await writeActions('');
        expect(await run([mapPath, actions, join(dir, 'missing-dir', 'out.txt')])).toBe(ExitCode.Save);
    });
});

describe('lineWriter', () => {
    afterEach(() => {
        worldSettings.resetToDefaults();
    });

    it('should end outcome lines with the configured line separator', () => {
        const written: string[] = [];
        worldSettings.state.lineSeparator = 'crlf';
        const write = lineWriter(text => written.push(text));

        write('Moved builder north');
        worldSettings.state.lineSeparator = 'lf';
        write('Top block on current tile removed');

        expect(written).toEqual(['Moved builder north\r\n', 'Top block on current tile removed\n']);
    });
});
