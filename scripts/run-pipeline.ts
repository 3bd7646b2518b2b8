import { readFile } from 'node:fs/promises';
import { loadConfig } from '@verity/schemas/src/config-loader.js';
import { createVerifier } from '@verity/core/src/verifier.js';
import { findVerdictLabel } from '@verity/core/src/agents/verdict-synthesizer.js';

interface CliArgs {
  readonly text?: string;
  readonly imagePath?: string;
}

function parseCliArgs(argv: readonly string[]): CliArgs {
  const imageFlag = argv.indexOf('--image');
  if (imageFlag === -1) {
    return { text: argv[0] };
  }

  const imagePath = argv[imageFlag + 1];
  if (imagePath === undefined) {
    throw new Error('--image needs a file path');
  }
  const rest = argv.filter((_, index) => index !== imageFlag && index !== imageFlag + 1);
  return { text: rest[0], imagePath };
}

async function main(): Promise<void> {
  const args = parseCliArgs(process.argv.slice(2));

  console.log('=== Verity Pipeline Runner ===\n');
  if (args.text !== undefined) {
    console.log(`Input text: ${args.text}`);
  }
  if (args.imagePath !== undefined) {
    console.log(`Input image: ${args.imagePath}`);
  }

  const config = await loadConfig();
  console.log(`Mock providers: ${config.mockProviders ? 'yes' : 'no'}\n`);

  const imageBytes = args.imagePath === undefined ? undefined : await readFile(args.imagePath);

  const startTime = Date.now();
  const verifier = createVerifier(config);
  const answer = await verifier.handle(args.text, imageBytes);
  const elapsed = Date.now() - startTime;

  console.log('--- Answer ---');
  console.log(answer);

  const verdict = findVerdictLabel(answer);
  if (verdict) {
    console.log(`\nDetected verdict: ${verdict}`);
  }

  console.log(`\n=== Pipeline completed in ${String(elapsed)}ms ===`);
}

main().catch((error: unknown) => {
  console.error('Pipeline failed:', error);
  process.exit(1);
});
