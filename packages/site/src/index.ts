#!/usr/bin/env node
/**
 * wikigarden - publish a folder of Markdown notes as a static site
 *
 * Usage: wikigarden [source-folder]
 *        wikigarden annotate [source-folder]
 *
 * `annotate` writes git history dates into each note's front matter.
 * Everything else is configured through WIKIGARDEN_* variables (see config.ts).
 */

import { buildLog } from '@wikigarden/core';
import { annotateTimestamps } from './annotate.js';
import { buildSite, createEnvironment } from './build.js';
import { loadConfigFromEnv } from './config.js';

async function annotate(argv: string[]): Promise<void> {
  const config = loadConfigFromEnv(process.env, argv);
  const annotated = await annotateTimestamps(config.sourceDir, { ignore: config.ignore });
  console.error(`[wikigarden] annotated ${annotated.length} notes`);
}

async function main(): Promise<void> {
  const argv = process.argv.slice(2);
  if (argv[0] === 'annotate') {
    await annotate(argv.slice(1));
    return;
  }

  const config = loadConfigFromEnv(process.env, argv);
  const result = await buildSite(config, createEnvironment());

  console.error(`[wikigarden] ${result.pages} pages (${result.written.length} written, ${result.reused.length} up to date), ` +
    `${result.attachments} attachments, ${result.unresolvedLinks.length} unresolved links`);
}

main().catch((err: unknown) => {
  buildLog('build', `Build failed: ${err instanceof Error ? err.message : String(err)}`, 'error');
  process.exit(1);
});
