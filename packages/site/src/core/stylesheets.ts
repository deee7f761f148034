/**
 * Stylesheets copied into the output: the site's own and the code
 * highlighting theme
 */

import * as fs from 'fs';
import { createRequire } from 'module';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { buildLog } from '@wikigarden/core';

const require = createRequire(import.meta.url);

/** Same relative location from src/core and dist/core */
export const SITE_STYLESHEET = fileURLToPath(new URL('../../assets/style.css', import.meta.url));

export const HIGHLIGHT_THEME = require.resolve('highlight.js/styles/github.css');

/** Output name, then source file */
const STYLESHEETS: ReadonlyArray<[string, string]> = [
  ['style.css', SITE_STYLESHEET],
  ['highlight.css', HIGHLIGHT_THEME],
];

/**
 * Copy the stylesheets into the output directory
 *
 * @returns The output names written
 */
export async function copyStylesheets(outputDir: string): Promise<string[]> {
  const written: string[] = [];
  for (const [name, source] of STYLESHEETS) {
    await fs.promises.copyFile(source, path.join(outputDir, name));
    written.push(name);
  }
  buildLog('render', `Copied stylesheets: ${written.join(', ')}`);
  return written;
}
