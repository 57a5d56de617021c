/**
 * Argument grammar for the rustdoc command:
 *   rustdoc <crate>[::<segment>...]
 *   rustdoc --index <crate>
 */

import { MissingArgumentError, MissingIndexTargetError } from '../errors/index.js';
import type { ParsedCommand } from '../types/docs.js';

export const INDEX_FLAG = '--index';
export const PATH_SEPARATOR = '::';

export function parseArgument(argument: string | undefined): ParsedCommand {
  if (argument === undefined || argument.trim() === '') {
    throw new MissingArgumentError();
  }

  const tokens = argument.split(/\s+/).filter(token => token.length > 0);
  let itemPath = '';
  let crateToIndex: string | undefined;

  for (let token = tokens.shift(); token !== undefined; token = tokens.shift()) {
    if (token === INDEX_FLAG) {
      crateToIndex = tokens.shift();
      if (crateToIndex === undefined) {
        throw new MissingIndexTargetError();
      }
      continue;
    }

    // Tokens are joined without whitespace; item paths never contain spaces
    itemPath += token;
  }

  if (crateToIndex !== undefined) {
    return { kind: 'index', crateName: crateToIndex };
  }

  const [crateName = '', ...segments] = itemPath.split(PATH_SEPARATOR);
  if (crateName === '') {
    throw new MissingArgumentError();
  }

  return {
    kind: 'lookup',
    crateName,
    itemPath: segments.filter(segment => segment.length > 0),
  };
}
