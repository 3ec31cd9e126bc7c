/**
 * Path Security - Rejects package paths that could escape the package root
 *
 * Candidate paths are percent-decoded (repeatedly, so double-encoded
 * sequences such as %252e%252e are caught) and NFKC-normalized (fullwidth
 * dots and solidi fold to ASCII) before any pattern is compared. Malformed
 * escapes stay literal text. Both '/' and '\' act as segment separators.
 */

import { IssueCodes } from './issue-codes';

export type PathViolationCode =
  | typeof IssueCodes.UNSAFE_PATH_TRAVERSAL
  | typeof IssueCodes.UNSAFE_ABSOLUTE_PATH
  | typeof IssueCodes.UNSAFE_EXTERNAL_URL
  | typeof IssueCodes.UNSAFE_NULL_BYTE;

export interface PathViolation {
  code: PathViolationCode;
  message: string;
  suggestedFix: string;
}

const MAX_DECODE_PASSES = 3;

// Two or more characters so that "C:" stays a drive letter
const URL_SCHEME = /^[a-zA-Z][a-zA-Z0-9+.-]+:/;
const PROTOCOL_RELATIVE = /^\/\//;
const ROOTED = /^[/\\]/;
const DRIVE_LETTER = /^[a-zA-Z]:/;
const SEGMENT_SEPARATOR = /[/\\]/;

/**
 * Decode and normalize a path the way a browser or file server might
 * before resolving it.
 */
export function normalizeForInspection(path: string): string {
  let current = path;

  for (let pass = 0; pass < MAX_DECODE_PASSES; pass++) {
    const decoded = tryDecode(current);
    if (decoded === current) {
      break;
    }
    current = decoded;
  }

  return current.normalize('NFKC');
}

// Runs of escapes are decoded on their own so that a stray '%' elsewhere in
// the path cannot stop the rest from decoding
const ESCAPE_RUN = /(?:%[0-9a-fA-F]{2})+/g;
const ASCII_ESCAPE = /%([0-7][0-9a-fA-F])/g;

function tryDecode(value: string): string {
  return value.replace(ESCAPE_RUN, run => {
    try {
      return decodeURIComponent(run);
    } catch (error) {
      if (!(error instanceof URIError)) {
        throw error;
      }
      // Not valid UTF-8 as a whole: decode the ASCII bytes, keep the rest
      return run.replace(ASCII_ESCAPE, (_escape, hex: string) => String.fromCharCode(Number.parseInt(hex, 16)));
    }
  });
}

export function hasTraversalSegment(path: string): boolean {
  return path.split(SEGMENT_SEPARATOR).some(segment => segment === '..');
}

export function isExternalUrl(path: string): boolean {
  return URL_SCHEME.test(path) || PROTOCOL_RELATIVE.test(path);
}

export function isAbsolutePath(path: string): boolean {
  return ROOTED.test(path) || DRIVE_LETTER.test(path);
}

/**
 * Check a single path. At most one violation is reported per path; classes
 * are tested in the order traversal, external URL, absolute path, null byte.
 */
export function checkPathSafety(path: string): PathViolation | null {
  const inspected = normalizeForInspection(path);

  if (hasTraversalSegment(inspected)) {
    return {
      code: IssueCodes.UNSAFE_PATH_TRAVERSAL,
      message: `Path contains directory traversal pattern: '${path}'`,
      suggestedFix: "Remove '../' or '..' from the path. All content should be within the package."
    };
  }

  if (isExternalUrl(inspected)) {
    return {
      code: IssueCodes.UNSAFE_EXTERNAL_URL,
      message: `Path references external URL: '${path}'`,
      suggestedFix: 'All resources must be packaged within the content. Remove external URL.'
    };
  }

  if (isAbsolutePath(inspected)) {
    return {
      code: IssueCodes.UNSAFE_ABSOLUTE_PATH,
      message: `Path is absolute but should be relative: '${path}'`,
      suggestedFix: "Use relative paths only. Remove leading '/' or drive letter."
    };
  }

  if (inspected.includes('\0')) {
    return {
      code: IssueCodes.UNSAFE_NULL_BYTE,
      message: `Path contains null byte: '${path}'`,
      suggestedFix: 'Remove null bytes from path.'
    };
  }

  return null;
}

export function isSafePath(path: string): boolean {
  return checkPathSafety(path) === null;
}
