import type {FileRequest} from '@tunnel-broker/schemas';

export type FileCommand = {
  command: string[];
  stdin?: Buffer;
};

// Paths travel as argv entries, never interpolated into a shell string.
export const toFileCommand = (request: FileRequest): FileCommand => {
  switch (request.operation) {
    case 'read':
      return {command: ['cat', '--', request.path]};
    case 'write':
      return {
        command: ['sh', '-c', 'cat > "$1"', 'sh', request.path],
        stdin: Buffer.from(request.content ?? '', 'utf8')
      };
    case 'list':
      return {command: ['ls', '-1Ap', '--', request.path]};
    case 'delete':
      return {command: ['rm', '-f', '--', request.path]};
  }
};
