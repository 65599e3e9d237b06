import 'dotenv/config';
import { existsSync } from 'node:fs';
import { basename } from 'node:path';
import { createLogger } from '@receipt-tracker/shared';
import { configFromEnv, createReceiptPipeline } from '@receipt-tracker/extraction';
import { getTextSource, textSourceConfigFromEnv } from '@receipt-tracker/api';

// Usage: npm run extract -- <file | receipt text...>
async function main() {
  const args = process.argv.slice(2);
  if (args.length === 0) {
    console.error('Usage: extract-receipt <file | text...>');
    process.exit(1);
  }

  const logger = createLogger({ scope: 'cli', level: process.env['OCR_DEBUG'] === '1' ? 'debug' : 'warn' });
  const pipeline = createReceiptPipeline({ config: configFromEnv(), logger });

  const [first] = args;
  let text = args.join(' ');
  if (args.length === 1 && first !== undefined && existsSync(first)) {
    const source = getTextSource(textSourceConfigFromEnv(), logger);
    ({ text } = await source.extract({ filePath: first, fileName: basename(first) }));
  }

  console.log(JSON.stringify(pipeline.process(text), null, 2));
}

main().catch(err => {
  console.error(err);
  process.exit(1);
});
