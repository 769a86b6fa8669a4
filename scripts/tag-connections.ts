// scripts/tag-connections.ts
//
// Tags the first TAGGER_MAX_RECORDS connections of a CSV export with
// inferred professional interests and writes TAGGER_OUTPUT_FILE.
//
// Usage:  npm run tag -- path/to/Connections.csv
//         npm run tag            (prompts for the path)

import 'dotenv/config';
import { createInterface } from 'readline/promises';
import { loadTaggerConfig } from '@/lib/config';
import { TaggerError } from '@/lib/errors';
import { runTagger } from '@/lib/run-tagger';
import type { ProgressCallback } from '@/lib/types';

async function promptForInputPath(): Promise<string> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    return await rl.question('Enter the path to your LinkedIn connections CSV file: ');
  } finally {
    rl.close();
  }
}

const onProgress: ProgressCallback = (message, type) => {
  if (type === 'success') console.log(`  ✓ ${message}`);
  else if (type === 'warning') console.log(`  ! ${message}`);
};

async function main() {
  // Credentials are checked before any record is read
  const config = loadTaggerConfig();
  const inputPath = process.argv[2] ?? await promptForInputPath();

  const { outputPath, summary } = await runTagger({ inputPath, config, onProgress });

  console.log(
    `\nDone. ${summary.tagged} tagged, ${summary.empty} without interests, ` +
    `${summary.rejected} skipped, ${summary.passedThrough} left as-is. Results saved to ${outputPath}`,
  );
}

main().catch((err: unknown) => {
  if (err instanceof TaggerError) {
    console.error(`Fatal error (${err.code}): ${err.message}`);
  } else {
    console.error('Fatal error:', err);
  }
  process.exit(1);
});
