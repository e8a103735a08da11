import type {ExecInput, PortForwardChannel, PortForwardInput, WorkloadRuntime} from './runtime';

export type InMemoryWorkload = {
  runtime: WorkloadRuntime;
  files: Map<string, string>;
  execCount: () => number;
  openForwards: () => number;
};

type CommandOutcome = {stdout?: string; stderr?: string; exitCode: number};

/**
 * Emulates the handful of commands the tunnel relies on against an in-memory file
 * table. Port forwards echo every chunk back; `block` never finishes until aborted.
 */
export const createInMemoryWorkload = ({
  files = new Map<string, string>(),
  forwardablePorts = [8888]
}: {
  files?: Map<string, string>;
  forwardablePorts?: number[];
} = {}): InMemoryWorkload => {
  let execs = 0;
  let forwards = 0;

  const listDirectory = (path: string) => {
    const prefix = path.endsWith('/') ? path : `${path}/`;
    const entries = new Set<string>();
    for (const name of files.keys()) {
      if (name.startsWith(prefix)) {
        const [head, ...rest] = name.slice(prefix.length).split('/');
        if (head) {
          entries.add(rest.length > 0 ? `${head}/` : head);
        }
      }
    }
    return [...entries].sort();
  };

  const runCommand = (argv: string[], stdin: string): CommandOutcome => {
    const [command, ...args] = argv;
    const operands = args.filter(arg => !arg.startsWith('-'));

    switch (command) {
      case 'echo':
        return {stdout: `${args.join(' ')}\n`, exitCode: 0};
      case 'cat': {
        const path = operands[0];
        const content = path === undefined ? undefined : files.get(path);
        if (path === undefined || content === undefined) {
          return {stderr: `cat: ${path ?? ''}: No such file or directory\n`, exitCode: 1};
        }
        return {stdout: content, exitCode: 0};
      }
      case 'ls': {
        const path = operands[0] ?? '.';
        const entries = listDirectory(path);
        if (entries.length === 0 && !files.has(path)) {
          return {stderr: `ls: cannot access '${path}': No such file or directory\n`, exitCode: 2};
        }
        return {stdout: entries.map(entry => `${entry}\n`).join(''), exitCode: 0};
      }
      case 'rm':
        for (const path of operands) {
          files.delete(path);
        }
        return {exitCode: 0};
      case 'sh':
        if (args[0] === '-c' && args[1] === 'cat > "$1"' && args[3] !== undefined) {
          files.set(args[3], stdin);
          return {exitCode: 0};
        }
        return {stderr: 'sh: unsupported script\n', exitCode: 2};
      case 'false':
        return {exitCode: 1};
      default:
        throw new Error(`executable file not found: ${command ?? ''}`);
    }
  };

  const exec = async ({command, stdin, onStdout, onStderr, signal}: ExecInput) => {
    execs += 1;
    signal.throwIfAborted();

    if (command[0] === 'block') {
      return new Promise<never>((_resolve, reject) => {
        signal.addEventListener('abort', () => reject(new Error('aborted')), {once: true});
      });
    }

    const outcome = runCommand(command, stdin?.toString('utf8') ?? '');
    if (outcome.stdout) {
      onStdout(Buffer.from(outcome.stdout, 'utf8'));
    }
    if (outcome.stderr) {
      onStderr(Buffer.from(outcome.stderr, 'utf8'));
    }
    return {exitCode: outcome.exitCode};
  };

  const openPortForward = async ({port, onData, onClose}: PortForwardInput): Promise<PortForwardChannel> => {
    if (!forwardablePorts.includes(port)) {
      throw new Error(`connection refused on port ${port}`);
    }

    forwards += 1;
    let open = true;
    return {
      write: chunk => {
        if (open) {
          queueMicrotask(() => onData(chunk));
        }
      },
      close: () => {
        if (open) {
          open = false;
          forwards -= 1;
          onClose();
        }
      }
    };
  };

  return {
    runtime: {exec, openPortForward},
    files,
    execCount: () => execs,
    openForwards: () => forwards
  };
};
