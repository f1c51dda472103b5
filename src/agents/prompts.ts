/**
 * Prompt templates for the four phase agents.
 *
 * Each agent has a system prompt and a context builder that renders the
 * relevant part of the pipeline state as the user message.
 *
 * @packageDocumentation
 */

import * as yaml from 'js-yaml';
import {
  REQUIRED_ARTIFACTS,
  type ArtifactSet,
  type PipelineState,
  type Plan,
  type Requirements,
} from '../pipeline/types.js';

/**
 * System prompt for the clarifier agent.
 *
 * @returns The system prompt string.
 */
export function createClarifierSystemPrompt(): string {
  return `You are a requirements analyst for small browser games. Turn a rough game idea into requirements a developer can implement without guessing.

RULES:
1. Ask at most 2 questions per turn, and only questions that change how the game is built.
2. Stop asking once game type, core mechanic, win condition and control scheme are known.
3. Never ask about cosmetics such as colours, fonts or pixel sizes.
4. Offer multiple-choice options where you can.
5. Never re-ask something the idea or an earlier answer already settles.
6. If the human says "you decide", "no preference" or answers vaguely, accept it: set that field to "Agent will decide" and move on.

PRIORITY (ask only for what is missing):
1. Game type (platformer, puzzle, shooter, arcade, ...)
2. Core mechanic (jump, shoot, match, steer, ...)
3. Win and lose conditions
4. Control scheme (keyboard, mouse, touch)

Respond with ONLY a JSON object, no code fences:
{
  "complete": boolean,
  "questions": ["question 1", "question 2"],
  "requirements": {
    "game_type": "string or null",
    "core_mechanic": "string or null",
    "win_condition": "string or null",
    "lose_condition": "string or null",
    "control_scheme": "string or null",
    "visual_style": "string or null",
    "additional_features": ["string"]
  }
}

When "complete" is true, "questions" must be empty. When it is false, fill in what you already know and leave unknown fields null.`;
}

/**
 * System prompt for the planner agent.
 *
 * @returns The system prompt string.
 */
export function createPlannerSystemPrompt(): string {
  return `You are a technical game designer. Write an implementable design document for a browser game as a single JSON object.

FRAMEWORK CHOICE:
- "phaser" for physics, platformers, sprite animation, particles or involved collision handling.
- "vanilla-js" (Canvas 2D) for simple mechanics (snake, pong), grid games (match-3, minesweeper) and anything with few assets.

Respond with ONLY the JSON object, with no code fences and no text around it:
{
  "metadata": {
    "game_title": "Descriptive Name",
    "game_type": "platformer | shooter | puzzle | arcade",
    "framework": "phaser | vanilla-js",
    "estimated_complexity": "simple | moderate | complex"
  },
  "core_mechanics": {
    "player_actions": [{ "action": "name", "control": "key binding", "mechanics": "behaviour" }],
    "game_loop": ["step 1", "step 2"]
  },
  "technical_architecture": {
    "framework_choice": { "selected": "phaser | vanilla-js", "reasoning": "why" },
    "file_structure": ["index.html", "style.css", "game.js"],
    "game_systems": {
      "physics_engine": "description",
      "collision_detection": "description",
      "state_management": "description",
      "rendering": "description"
    }
  },
  "asset_specifications": {
    "player": { "type": "rectangle | circle | sprite", "dimensions": "WxH px", "color": "#hex" },
    "enemies": { "count": 0, "behavior": "description", "spawn_logic": "description" },
    "environment": { "description": "background and world" }
  },
  "controls": { "keyboard": [{ "key": "ArrowLeft | A", "action": "Move left" }] },
  "game_rules": {
    "win_condition": "description",
    "lose_condition": "description",
    "scoring": "description",
    "difficulty": "description"
  },
  "implementation_notes": {
    "critical_features": ["feature"],
    "edge_cases": ["edge case"]
  }
}`;
}

/**
 * System prompt for the executor agent.
 *
 * @returns The system prompt string.
 */
export function createExecutorSystemPrompt(): string {
  return `You are an expert browser game developer. Write a complete, playable game from the design document you are given.

REQUIREMENTS:
1. Produce exactly three files: index.html, style.css and game.js.
2. Every file is finished code. No placeholders, no TODO comments, no stub or empty functions.
3. Opening index.html in a browser must start the game.
4. With Phaser, load it from https://cdn.jsdelivr.net/npm/phaser@3.70.0/dist/phaser.min.js.
5. With vanilla JS, draw on a Canvas 2D context and drive the loop with requestAnimationFrame.
6. Implement every system the design document lists.
7. Draw with coloured shapes; load no image files.

EVERY GAME NEEDS:
- collision detection
- start, playing and game-over states
- a restart control
- a visible score
- working win and lose conditions
- the player kept inside the canvas

No ES modules, no bundler, no npm. Everything beyond the CDN script lives in the three files.

Put each file in its own fenced block tagged with its language:

\`\`\`html
<!-- index.html -->
\`\`\`

\`\`\`css
/* style.css */
\`\`\`

\`\`\`javascript
// game.js
\`\`\``;
}

/**
 * System prompt for the semantic validator agent.
 *
 * @returns The system prompt string.
 */
export function createValidatorSystemPrompt(): string {
  return `You are a QA engineer reviewing generated browser game code. Check the three files against this list:

1. index.html, style.css and game.js are all present and non-empty.
2. No TODO comments, placeholder text or stub functions.
3. Every function has a real body.
4. A game loop exists (requestAnimationFrame or a Phaser update).
5. Collisions are detected and handled.
6. Win and lose conditions are implemented.
7. The game can be restarted.
8. No obvious syntax errors such as unbalanced braces.
9. The canvas or Phaser container is initialised.
10. Keyboard or mouse input is bound.

Respond with ONLY a JSON object:
{
  "valid": boolean,
  "issues": ["issue"],
  "suggestions": ["improvement"]
}

Be strict: if any item fails, "valid" is false. When "valid" is true, "issues" must be empty.`;
}

function titleCase(key: string): string {
  return key
    .split('_')
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(' ');
}

/**
 * Renders requirements as a bullet list, skipping unknown fields.
 *
 * @param requirements - Requirements gathered so far.
 * @returns One `- Label: value` line per known field.
 */
export function formatRequirements(requirements: Readonly<Requirements> | undefined): string {
  const none = 'No structured requirements available.';
  if (requirements === undefined) {
    return none;
  }
  const lines: string[] = [];
  for (const [key, value] of Object.entries(requirements)) {
    if (Array.isArray(value)) {
      if (value.length > 0) {
        lines.push(`- ${titleCase(key)}: ${value.join(', ')}`);
      }
    } else if (typeof value === 'string') {
      lines.push(`- ${titleCase(key)}: ${value}`);
    }
  }
  return lines.length > 0 ? lines.join('\n') : none;
}

/**
 * Renders the plan as YAML for the executor.
 *
 * @param plan - The design document.
 * @returns YAML text, or a placeholder line when there is no plan.
 */
export function formatPlan(plan: Readonly<Plan> | undefined): string {
  if (plan === undefined) {
    return 'No plan available.';
  }
  return yaml.dump(plan, {
    indent: 2,
    lineWidth: -1,
    noRefs: true,
    sortKeys: false,
  });
}

/**
 * Builds the clarifier's user message: the idea, the dialogue so far and
 * the partial requirements.
 */
export function buildClarifierContext(state: Readonly<PipelineState>): string {
  const parts = [`Game idea: ${state.originalRequest}`];

  if (state.dialogue.length > 0) {
    parts.push('\nPrevious conversation:');
    for (const entry of state.dialogue) {
      const role = entry.role === 'assistant' ? 'Assistant' : 'User';
      parts.push(`  ${role}: ${entry.content}`);
    }
  }

  if (state.requirements !== undefined) {
    parts.push(`\nCurrent requirements (partial): ${JSON.stringify(state.requirements)}`);
  }

  return parts.join('\n');
}

/**
 * Builds the planner's user message.
 */
export function buildPlannerContext(state: Readonly<PipelineState>): string {
  return [
    'Create a complete game design document for the following game:',
    '',
    formatRequirements(state.requirements),
    '',
    `Original game idea: ${state.originalRequest}`,
  ].join('\n');
}

/**
 * Builds the executor's user message. On a retry the issues from the last
 * validation are appended so the next attempt can address them.
 */
export function buildExecutorContext(state: Readonly<PipelineState>): string {
  const message = `Game Plan:\n\n${formatPlan(state.plan)}`;
  const issues = state.validationResult?.issues ?? [];
  if (state.retryCount === 0 || issues.length === 0) {
    return message;
  }
  const list = issues.map((issue) => `- ${issue}`).join('\n');
  return `${message}\n\nIMPORTANT: the previous attempt failed validation. Fix these issues:\n${list}`;
}

/**
 * Builds the validator's user message: each file under a `=== name ===`
 * header.
 */
export function buildValidatorContext(artifacts: Readonly<ArtifactSet>): string {
  return REQUIRED_ARTIFACTS.map((name) => `=== ${name} ===\n${artifacts[name]}\n`).join('\n');
}
