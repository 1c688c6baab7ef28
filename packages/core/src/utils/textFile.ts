import * as fs from 'fs';

const BYTE_ORDER_MARK = '\uFEFF';

/**
 * Reads a UTF-8 text file in full, dropping a leading byte-order mark.
 * Read errors (ENOENT, EACCES, ...) propagate to the caller.
 */
export function readTextFile(filePath: string): string {
  const content = fs.readFileSync(filePath, 'utf-8');
  return content.startsWith(BYTE_ORDER_MARK) ? content.slice(1) : content;
}
