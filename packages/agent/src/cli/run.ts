import { parseArgs } from 'node:util';
import { InvalidArgumentError } from '../core/errors.js';
import { resolveWeather } from '../core/weather/resolver.js';

export const USAGE = 'Usage: weather-agent <location>\n\nQuery mock weather for a location.\n';

export interface CliIO {
    stdout: { write(text: string): unknown };
    stderr: { write(text: string): unknown };
}

export type Resolve = (location: string) => Promise<string>;

function parseCliArgs(argv: string[]) {
    return parseArgs({
        args: argv,
        allowPositionals: true,
        options: { help: { type: 'boolean', short: 'h' } },
    });
}

/**
 * 命令行核心逻辑，返回进程退出码
 */
export async function runCli(
    argv: string[],
    io: CliIO = process,
    resolve: Resolve = location => resolveWeather(location)
): Promise<number> {
    let parsed: ReturnType<typeof parseCliArgs>;
    try {
        parsed = parseCliArgs(argv);
    } catch (error) {
        io.stderr.write(`${error instanceof Error ? error.message : String(error)}\n${USAGE}`);
        return 2;
    }

    if (parsed.values.help) {
        io.stdout.write(USAGE);
        return 0;
    }

    const [location, ...extra] = parsed.positionals;
    if (location === undefined || extra.length > 0) {
        io.stderr.write(USAGE);
        return 2;
    }

    try {
        io.stdout.write(`${await resolve(location)}\n`);
        return 0;
    } catch (error) {
        if (error instanceof InvalidArgumentError) {
            io.stderr.write(`error: ${error.message}\n`);
            return 1;
        }
        throw error;
    }
}
