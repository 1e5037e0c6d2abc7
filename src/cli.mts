// @author lockerdb contributors
// @date 2026-10-19
import { CollectionStore } from './collection-store.mjs';
import { Namespace } from './namespace.mjs';
import { loadConfig, resolveConfigPath, type LockerConfig } from './config.mjs';
import { startServer } from './lockerdbd.mjs';
import { getErrorMessage } from './errors.mjs';

export interface OutputStream {
  write(chunk: string): unknown;
}

export interface CliIO {
  stdout: OutputStream;
  stderr: OutputStream;
  env: NodeJS.ProcessEnv;
}

const COMMAND_USAGE = {
  server: 'server',
  add: 'add <collection_name> [<schema_name> [<json_data>]]',
  insert: 'insert <collection_name> <json_data> [<schema_name>]',
  read: 'read <collection_name> [<schema_name>]',
  edit: 'edit <collection_name> <id> <json_data> [<schema_name>]',
  remove: 'remove <collection_name> <id> [<schema_name>]',
  drop: 'drop <collection_name> [<schema_name>]',
  list: 'list [<schema_name>]',
} as const;

type Command = keyof typeof COMMAND_USAGE;

/** Accepted positional argument counts per command. */
const ARITY: Record<Command, [min: number, max: number]> = {
  server: [0, 0],
  add: [1, 3],
  insert: [2, 3],
  read: [1, 2],
  edit: [3, 4],
  remove: [2, 3],
  drop: [1, 2],
  list: [0, 1],
};

export const USAGE = `Usage: lockerdb <command> [args]
Commands:
  server - Start the REST API and web portal
  ${COMMAND_USAGE.add}
  ${COMMAND_USAGE.insert}
  ${COMMAND_USAGE.read}
  ${COMMAND_USAGE.edit}
  ${COMMAND_USAGE.remove}
  ${COMMAND_USAGE.drop}
  ${COMMAND_USAGE.list}
Examples:
  lockerdb server
  lockerdb add users
  lockerdb add users public '{"name":"nun", "age": 20}'
  lockerdb insert users '{"name":"bob", "level": 5}' public
  lockerdb read users
  lockerdb edit users <id> '{"name":"newname", "age": 25}' public
  lockerdb remove users <id>
  lockerdb drop users public
`;

function isCommand(name: string): name is Command {
  return Object.hasOwn(COMMAND_USAGE, name);
}

async function runCommand(command: Command, args: string[], config: LockerConfig, io: CliIO): Promise<void> {
  const namespace = new Namespace({ rootDir: config.dataDir, defaultSchema: config.schemaName });
  const store = new CollectionStore(namespace);
  const out = (line: string) => io.stdout.write(`${line}\n`);
  const [first = '', second = '', third = '', fourth = ''] = args;

  switch (command) {
    case 'server':
      await startServer(config);
      return;

    case 'add': {
      await store.create(second, first, third);
      out(`Created collection ${first} at ${namespace.collectionPaths(second, first).dataPath}`);
      return;
    }

    case 'insert': {
      const record = await store.insert(third, first, second);
      out(`Inserted record ${record._id} into collection ${first}`);
      return;
    }

    case 'read': {
      const records = await store.load(second, first);
      out(`Collection ${first} contents:\n${JSON.stringify(records, null, 2)}`);
      return;
    }

    case 'edit':
      await store.update(fourth, first, second, third);
      out(`Updated record ${second} in collection ${first}`);
      return;

    case 'remove':
      await store.delete(third, first, second);
      out(`Removed record ${second} from collection ${first}`);
      return;

    case 'drop':
      await store.drop(second, first);
      out(`Dropped collection ${first} from ${namespace.schemaDir(second)}`);
      return;

    case 'list':
      for (const name of await store.list(first)) out(name);
      return;
  }
}

/**
 * Runs one `lockerdb` invocation.
 *
 * @param argv - Arguments after the program name.
 * @returns The process exit code. `server` resolves once the daemon listens and leaves it running.
 */
export async function runCli(
  argv: string[],
  io: CliIO = { stdout: process.stdout, stderr: process.stderr, env: process.env },
): Promise<number> {
  const [name, ...args] = argv;

  if (name === undefined) {
    io.stderr.write(USAGE);
    return 1;
  }
  if (!isCommand(name)) {
    io.stderr.write(`Unknown command: ${name}\n${USAGE}`);
    return 1;
  }

  const [min, max] = ARITY[name];
  if (args.length < min || args.length > max) {
    io.stderr.write(`Usage: lockerdb ${COMMAND_USAGE[name]}\n`);
    return 1;
  }

  try {
    const config = await loadConfig(resolveConfigPath(io.env));
    await runCommand(name, args, config, io);
    return 0;
  } catch (error) {
    io.stderr.write(`Error: ${getErrorMessage(error)}\n`);
    return 1;
  }
}
