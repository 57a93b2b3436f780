#!/usr/bin/env node

/**
 * layout-scout CLI
 *
 * Usage:
 *   layout-scout [tags] [--limit n] [--offset n] [--redupe] [--format table|json|markdown]
 *
 * `tags` is a comma-separated tag filter, e.g. `layout-scout colemak,mouse`.
 */

import { createProgram } from './program';
import { errorMessage } from './core/errors';

// ─── Run ────────────────────────────────────────────────────────────────────

createProgram().parseAsync(process.argv).catch((error: unknown) => {
  console.error(`❌ Error: ${errorMessage(error)}`);
  process.exit(1);
});
