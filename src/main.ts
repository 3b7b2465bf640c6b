import { lineWriter, runCli } from './cli';
import { LogHandler } from './utilities/log-handler';

const log = new LogHandler('Main');

runCli(process.argv.slice(2), {
    output: lineWriter((text) => process.stdout.write(text)),
    stdin: process.stdin,
}).then((code) => {
    process.exitCode = code;
}).catch((err: unknown) => {
    log.error('Unexpected failure', err instanceof Error ? err : undefined);
    process.exitCode = 1;
});
