import { describe, it, expect } from 'vitest';
import { createInitialState, type PipelineState } from '../../pipeline/types.js';
import {
  formatAttemptIssues,
  formatFilesSummary,
  formatPlanSummary,
  formatQuestion,
  formatRunSummary,
} from './displayUtils.js';

const PLAIN = { colors: false, unicode: false };

function finished(overrides: Partial<PipelineState>): PipelineState {
  return { ...createInitialState('a maze game'), phase: 'done', done: true, ...overrides };
}

describe('formatQuestion', () => {
  it('numbers the question', () => {
    expect(formatQuestion('Top-down or side view?', 1, 3, PLAIN)).toBe('(2/3) Top-down or side view?');
  });

  it('bolds the counter with colors on', () => {
    expect(formatQuestion('Top-down?', 0, 1, { colors: true, unicode: false })).toBe(
      '\x1b[1m(1/1)\x1b[0m Top-down?'
    );
  });
});

describe('formatRunSummary', () => {
  it('points at the saved game', () => {
    const state = finished({
      validationResult: { valid: true, issues: [], suggestions: [] },
      outputLocation: '/games/maze',
    });

    expect(formatRunSummary(state, { colors: false, unicode: true })).toBe(
      '✔ Game saved to /games/maze\nOpen index.html in a browser to play.'
    );
  });

  it('reports a valid game that could not be saved', () => {
    const state = finished({ validationResult: { valid: true, issues: [], suggestions: [] } });

    expect(formatRunSummary(state, PLAIN)).toBe(
      '[ok] Game passed validation\nFiles could not be saved; see the log for details.'
    );
  });

  it('lists unresolved issues of a best-effort game', () => {
    const state = finished({
      validationResult: { valid: false, issues: ['Walls overlap', 'No exit'], suggestions: [] },
      retryCount: 3,
      bestEffort: true,
      outputLocation: '/games/maze',
    });

    expect(formatRunSummary(state, PLAIN)).toBe(
      [
        '[!] Validation still failing; retry budget used up',
        'Best-effort files saved to /games/maze',
        'Unresolved issues:',
        '  - Walls overlap',
        '  - No exit',
      ].join('\n')
    );
  });
});

describe('formatPlanSummary', () => {
  it('lists the headline facts of a full plan', () => {
    const plan = {
      metadata: { game_title: 'Maze Runner', game_type: 'puzzle', estimated_complexity: 'medium' },
      game_rules: { win_condition: 'Reach the exit', lose_condition: 'Timer hits zero' },
      controls: {
        keyboard: [
          { key: 'ArrowUp', action: 'move up' },
          { key: 'Space', action: 'pause' },
        ],
      },
      technical_architecture: {
        framework_choice: { selected: 'phaser', reasoning: 'Tilemaps built in' },
      },
    };

    expect(formatPlanSummary(plan, PLAIN)).toBe(
      [
        'Game design document',
        '  Title           Maze Runner',
        '  Type            puzzle',
        '  Framework       phaser',
        '  Complexity      medium',
        '  Win condition   Reach the exit',
        '  Lose condition  Timer hits zero',
        '  Controls        ArrowUp -> move up, Space -> pause',
        '  Why framework   Tilemaps built in',
      ].join('\n')
    );
  });

  it('prefers the metadata framework and skips missing rows', () => {
    const plan = {
      metadata: { game_title: 'Pong', framework: 'vanilla-js' },
      technical_architecture: { framework_choice: { selected: 'phaser' } },
      controls: { keyboard: 'not a list' },
    };

    expect(formatPlanSummary(plan, { colors: false, unicode: true })).toBe(
      'Game design document\n  Title           Pong\n  Framework       vanilla-js'
    );
  });

  it('prints only the header for an empty plan', () => {
    expect(formatPlanSummary({}, PLAIN)).toBe('Game design document');
  });
});

describe('formatAttemptIssues', () => {
  it('numbers the attempt and lists its issues', () => {
    expect(formatAttemptIssues(2, ['No exit', 'Walls overlap'], { colors: false, unicode: true })).toBe(
      '⚠ Attempt 2 failed validation\n  • No exit\n  • Walls overlap'
    );
  });
});

describe('formatFilesSummary', () => {
  it('aligns file names and sizes in KB', () => {
    const artifacts = {
      'index.html': 'x'.repeat(2048),
      'style.css': 'a'.repeat(512),
      'game.js': '',
    };

    expect(formatFilesSummary(artifacts, PLAIN)).toBe(
      [
        'Generated files',
        '  index.html    2.0 KB',
        '  style.css     0.5 KB',
        '  game.js       0.0 KB',
      ].join('\n')
    );
  });
});
