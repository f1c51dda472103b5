import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { Logger } from '../utils/logger.js';
import { extractNamedBlocks } from './named-blocks.js';

const HTML = '<!DOCTYPE html>\n<html><body><canvas id="c"></canvas><script src="game.js"></script></body></html>';
const CSS = 'body { margin: 0; background: #000; }';
const JS = 'const ctx = document.getElementById("c").getContext("2d");\nfunction update() {}';

function fence(language: string, body: string): string {
  return '```' + language + '\n' + body + '\n```';
}

describe('extractNamedBlocks', () => {
  it('maps language-tagged blocks to file names', () => {
    const raw = [
      'Here is your game.',
      fence('html', HTML),
      fence('css', CSS),
      fence('javascript', JS),
    ].join('\n\n');

    expect(extractNamedBlocks(raw)).toEqual({
      artifacts: { 'index.html': HTML, 'style.css': CSS, 'game.js': JS },
      missing: [],
    });
  });

  it('property: recovers all three tagged blocks in any order', () => {
    const blocks = [fence('html', HTML), fence('css', CSS), fence('javascript', JS)];

    fc.assert(
      fc.property(
        fc.shuffledSubarray(blocks, { minLength: 3, maxLength: 3 }),
        fc.constantFrom('\n', '\n\nNext file:\n', '\nAnd then\n'),
        (ordered, separator) => {
          expect(extractNamedBlocks(ordered.join(separator))).toEqual({
            artifacts: { 'index.html': HTML, 'style.css': CSS, 'game.js': JS },
            missing: [],
          });
        }
      )
    );
  });

  it('accepts js and upper-case tags', () => {
    const raw = [fence('HTML', HTML), fence('Css', CSS), fence('js', JS)].join('\n');
    const { artifacts, missing } = extractNamedBlocks(raw);

    expect(artifacts['game.js']).toBe(JS);
    expect(artifacts['index.html']).toBe(HTML);
    expect(missing).toEqual([]);
  });

  it('keeps the first tagged block for each name', () => {
    const raw = [fence('js', JS), fence('js', 'let second = 2;')].join('\n');
    expect(extractNamedBlocks(raw).artifacts['game.js']).toBe(JS);
  });

  it('classifies untagged blocks by content', () => {
    const raw = [fence('', JS), fence('', CSS), fence('', HTML)].join('\n');

    expect(extractNamedBlocks(raw).artifacts).toEqual({
      'index.html': HTML,
      'style.css': CSS,
      'game.js': JS,
    });
  });

  it('fills only the gaps left by tagged blocks', () => {
    const raw = [fence('html', HTML), fence('css', CSS), fence('', JS)].join('\n');
    const { artifacts, missing } = extractNamedBlocks(raw);

    expect(artifacts['game.js']).toBe(JS);
    expect(missing).toEqual([]);
  });

  it('reports unfilled names as missing with empty content', () => {
    const lines: string[] = [];
    const logger = new Logger({ component: 'Test', sink: (l) => lines.push(l) });

    const { artifacts, missing } = extractNamedBlocks(fence('html', HTML), logger);

    expect(artifacts).toEqual({ 'index.html': HTML, 'style.css': '', 'game.js': '' });
    expect(missing).toEqual(['style.css', 'game.js']);
    expect(lines).toHaveLength(2);
    expect(lines[0]).toContain('"event":"named_block_missing"');
    expect(lines[0]).toContain('"name":"style.css"');
  });

  it('treats an empty tagged block as unfilled', () => {
    const { missing } = extractNamedBlocks([fence('css', '   '), fence('html', HTML)].join('\n'));
    expect(missing).toEqual(['style.css', 'game.js']);
  });

  it('returns everything missing for text without fences', () => {
    expect(extractNamedBlocks('I could not generate the game.').missing).toEqual([
      'index.html',
      'style.css',
      'game.js',
    ]);
  });
});
