/**
 * `vdf-tree` argument parsing.
 *
 * Supported flags:
 * - `-u`, `--unpack`: export the whole tree.
 * - `-e`, `--extract NAME`: export a node by name (`*` selects a filter).
 * - `-a`, `--add SOURCE DEST`: insert a host file or directory.
 * - `-r`, `--remove NAME`: remove by name (`*` selects a filter).
 * - `-v`, `--view_vfs_tree`: print the tree.
 * - `-o`, `--output_path PATH`: output directory or archive path.
 * - `-g1`, `--gothic1`: save in the Gothic 1 format.
 * - `-d`, `--debug`, `-f`, `--full_debug`: log verbosity.
 * - `-h`, `--help`: print usage.
 */

export type CliAction =
    | { kind: 'none' }
    | { kind: 'unpack' }
    | { kind: 'extract'; name: string }
    | { kind: 'add'; source: string; destination: string }
    | { kind: 'remove'; name: string }
    | { kind: 'view' };

export interface CliOptions {
    archivePath: string;
    action: CliAction;
    outputPath?: string;
    gothic1: boolean;
    debug: boolean;
    fullDebug: boolean;
}

export type CliParseResult =
    | { ok: true; options: CliOptions }
    | { ok: false; stderr: string; exitCode: number };

export const USAGE: string = [
    'usage: vdf-tree <archive.vdf> [-u | -e NAME | -a SOURCE DEST | -r NAME | -v] [-o PATH] [-g1] [-d] [-f]',
    '',
    '  -u, --unpack                export every file',
    '  -e, --extract NAME          export a file or directory (NAME with * exports every matching file)',
    '  -a, --add SOURCE DEST       add a host file or directory at DEST (. or / is the root)',
    '  -r, --remove NAME           remove a file or directory (NAME with * removes every matching file)',
    '  -v, --view_vfs_tree         print the archive tree',
    '  -o, --output_path PATH      output directory, or archive path for -a and -r',
    '  -g1, --gothic1              save as a Gothic 1 archive',
    '  -d, --debug                 debug logging',
    '  -f, --full_debug            trace logging',
    '  -h, --help                  show this help'
].join('\n');

/**
 * Parse `vdf-tree` flags and the archive operand.
 */
export function cliArgs_parse(args: string[]): CliParseResult {
    let archivePath: string | undefined;
    let action: CliAction = { kind: 'none' };
    let outputPath: string | undefined;
    let gothic1: boolean = false;
    let debug: boolean = false;
    let fullDebug: boolean = false;

    const action_set = (next: CliAction): string | null => {
        if (action.kind !== 'none') {
            return 'vdf-tree: only one of -u, -e, -a, -r, -v may be given';
        }
        action = next;
        return null;
    };

    let parseOptions: boolean = true;
    let index: number = 0;
    while (index < args.length) {
        const arg: string = args[index];
        index += 1;

        if (parseOptions && arg === '--') {
            parseOptions = false;
            continue;
        }

        if (!parseOptions || !arg.startsWith('-') || arg === '-') {
            if (archivePath !== undefined) {
                return { ok: false, stderr: `vdf-tree: unexpected argument '${arg}'\n${USAGE}`, exitCode: 1 };
            }
            archivePath = arg;
            continue;
        }

        const arity: number = optionArity_get(arg);
        if (arity < 0) {
            return { ok: false, stderr: `vdf-tree: unrecognized option '${arg}'\n${USAGE}`, exitCode: 1 };
        }
        if (index + arity > args.length) {
            return { ok: false, stderr: `vdf-tree: option requires an argument -- '${arg}'\n${USAGE}`, exitCode: 1 };
        }
        const values: string[] = args.slice(index, index + arity);
        index += arity;

        let conflict: string | null = null;
        switch (arg) {
            case '-h':
            case '--help':
                return { ok: false, stderr: USAGE, exitCode: 0 };
            case '-u':
            case '--unpack':
                conflict = action_set({ kind: 'unpack' });
                break;
            case '-e':
            case '--extract':
                conflict = action_set({ kind: 'extract', name: values[0] });
                break;
            case '-a':
            case '--add':
                conflict = action_set({ kind: 'add', source: values[0], destination: values[1] });
                break;
            case '-r':
            case '--remove':
                conflict = action_set({ kind: 'remove', name: values[0] });
                break;
            case '-v':
            case '--view_vfs_tree':
                conflict = action_set({ kind: 'view' });
                break;
            case '-o':
            case '--output_path':
                outputPath = values[0];
                break;
            case '-g1':
            case '--gothic1':
                gothic1 = true;
                break;
            case '-d':
            case '--debug':
                debug = true;
                break;
            case '-f':
            case '--full_debug':
                fullDebug = true;
                break;
        }
        if (conflict) {
            return { ok: false, stderr: `${conflict}\n${USAGE}`, exitCode: 1 };
        }
    }

    if (archivePath === undefined) {
        return { ok: false, stderr: `vdf-tree: missing archive operand\n${USAGE}`, exitCode: 1 };
    }

    return { ok: true, options: { archivePath, action, outputPath, gothic1, debug, fullDebug } };
}

/**
 * Number of values an option consumes, or -1 for an unknown option.
 */
function optionArity_get(arg: string): number {
    switch (arg) {
        case '-e':
        case '--extract':
        case '-r':
        case '--remove':
        case '-o':
        case '--output_path':
            return 1;
        case '-a':
        case '--add':
            return 2;
        case '-h':
        case '--help':
        case '-u':
        case '--unpack':
        case '-v':
        case '--view_vfs_tree':
        case '-g1':
        case '--gothic1':
        case '-d':
        case '--debug':
        case '-f':
        case '--full_debug':
            return 0;
        default:
            return -1;
    }
}
