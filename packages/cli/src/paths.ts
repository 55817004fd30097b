/**
 * @summary Files shipped beside the CLI code.
 *
 * Resolved from `src/` and `dist/` alike: both sit one level below the
 * package root.
 */

import { fileURLToPath } from "node:url";

/** Bundled skeleton test template */
export const SKELETON_TEMPLATE_PATH = fileURLToPath(
  new URL("../templates/skeleton.test.ts.template", import.meta.url)
);
