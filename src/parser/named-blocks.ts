/**
 * Named-blocks response parsing: pulls the three game files out of fenced
 * code blocks in model output.
 *
 * @packageDocumentation
 */

import {
  REQUIRED_ARTIFACTS,
  emptyArtifacts,
  type ArtifactName,
  type ArtifactSet,
} from '../pipeline/types.js';
import { silentLogger, type Logger } from '../utils/logger.js';

/**
 * Result of {@link extractNamedBlocks}.
 */
export interface NamedBlocks {
  /** Extracted files; names that could not be filled are `''`. */
  artifacts: ArtifactSet;
  /** Names left unfilled, in output order. */
  missing: ArtifactName[];
}

const LANGUAGE_TO_ARTIFACT: Readonly<Record<string, ArtifactName>> = {
  html: 'index.html',
  css: 'style.css',
  javascript: 'game.js',
  js: 'game.js',
};

const TAGGED_BLOCK_RE = /```(html|css|javascript|js)[ \t]*\r?\n([\s\S]*?)```/gi;
const ANY_BLOCK_RE = /```(?:html|css|javascript|js)?[ \t]*\r?\n([\s\S]*?)```/gi;

/**
 * Content signatures used when a block carries no usable language tag.
 * Checked in artifact order; a block goes to the first unfilled name it matches.
 */
const CONTENT_SIGNATURES: readonly { name: ArtifactName; matches: (block: string) => boolean }[] = [
  { name: 'index.html', matches: (block) => /<!doctype|<html/i.test(block) },
  {
    name: 'style.css',
    matches: (block) => block.includes('{') && /margin|padding|body|canvas/.test(block),
  },
  { name: 'game.js', matches: (block) => /function|const |var |let |class /.test(block) },
];

/**
 * Extracts `index.html`, `style.css` and `game.js` from fenced blocks.
 *
 * Language-tagged blocks are taken first (`html`, `css`, `javascript`/`js`,
 * case-insensitive, first non-empty match per name). If any name is still
 * unfilled, every fenced block is classified by content and assigned to the
 * first unfilled name whose signature it matches.
 *
 * @param raw - Model output.
 * @param logger - Receives one `named_block_missing` warning per unfilled name.
 * @returns The artifacts and the names that stayed empty.
 */
export function extractNamedBlocks(raw: string, logger: Logger = silentLogger): NamedBlocks {
  const artifacts = emptyArtifacts();
  const filled = new Set<ArtifactName>();

  for (const match of raw.matchAll(TAGGED_BLOCK_RE)) {
    const language = match[1]?.toLowerCase();
    const content = match[2]?.trim() ?? '';
    const name = language !== undefined ? LANGUAGE_TO_ARTIFACT[language] : undefined;
    if (name !== undefined && !filled.has(name) && content !== '') {
      artifacts[name] = content;
      filled.add(name);
    }
  }

  if (filled.size < REQUIRED_ARTIFACTS.length) {
    for (const match of raw.matchAll(ANY_BLOCK_RE)) {
      const block = match[1]?.trim() ?? '';
      if (block === '') {
        continue;
      }
      const signature = CONTENT_SIGNATURES.find(
        ({ name, matches }) => !filled.has(name) && matches(block)
      );
      if (signature !== undefined) {
        artifacts[signature.name] = block;
        filled.add(signature.name);
      }
    }
  }

  const missing = REQUIRED_ARTIFACTS.filter((name) => !filled.has(name));
  for (const name of missing) {
    logger.warn('named_block_missing', { name });
  }

  return { artifacts, missing };
}
