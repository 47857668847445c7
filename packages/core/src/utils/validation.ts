import type { z } from 'zod';
import { accessSync, statSync, constants as fsConstants } from 'fs';
import { FailscopeError, ErrorCode } from '../errors.js';

export function validateFilePath(path: string): void {
  if (!path) {
    throw new FailscopeError(
      'Path argument is required',
      ErrorCode.INPUT_INVALID,
      'A valid path must be provided'
    );
  }

  try {
    accessSync(path, fsConstants.R_OK);
  } catch {
    throw new FailscopeError(
      `File is not accessible: ${path}`,
      ErrorCode.IO_FILE_NOT_FOUND,
      `Cannot access file: ${path}`,
      { path }
    );
  }

  if (!statSync(path).isFile()) {
    throw new FailscopeError(
      `Path is not a file: ${path}`,
      ErrorCode.IO_FILE_NOT_FOUND,
      `Expected a file but found a directory: ${path}`,
      { path }
    );
  }
}

export function validate<T>(schema: z.ZodType<T>, data: unknown, fieldName?: string): T {
  const result = schema.safeParse(data);
  if (result.success) {
    return result.data;
  }

  const issues = result.error.issues
    .map((issue, idx) => {
      const path = issue.path.length > 0 ? issue.path.map(String).join('.') : '(root)';
      return `  ${String(idx + 1)}. [${path}] ${issue.message}`;
    })
    .join('\n');

  throw new FailscopeError(
    `Validation failed${fieldName ? ` for ${fieldName}` : ''}:\n${issues}`,
    ErrorCode.INPUT_INVALID,
    `Invalid data${fieldName ? ` in ${fieldName}` : ''}: ${String(result.error.issues.length)} issue(s) found`,
    { field: fieldName }
  );
}
