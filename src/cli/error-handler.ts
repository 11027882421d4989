import { TreebankError } from '../errors.js';

function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error && typeof error.code === 'string';
}

/** One-line description of a failure, prefixed with the input it came from. */
export function describeError(error: unknown, file?: string): string {
  const where = file ? `${file}: ` : '';
  if (error instanceof TreebankError) {
    return `${where}${error.name}: ${error.message}`;
  }
  if (isNodeError(error)) {
    switch (error.code) {
      case 'ENOENT':
        return `${where}file not found`;
      case 'EACCES':
      case 'EPERM':
        return `${where}permission denied`;
      default:
        return `${where}${error.code}: ${error.message}`;
    }
  }
  if (error instanceof Error) return `${where}${error.message}`;
  return `${where}unknown error`;
}

export function handleError(error: unknown, file?: string): never {
  console.error(`treebank: ${describeError(error, file)}`);
  process.exit(1);
}
