#!/usr/bin/env tsx

/**
 * Generate JSON Schema from the Zod init configuration schema
 *
 * Lets configuration files written in JSON or YAML be validated by
 * editors and other tooling.
 *
 * Usage:
 *   tsx scripts/generate-schema.ts
 *   npm run generate:schema
 */

import fs from 'fs';
import path from 'path';
import { configJsonSchema } from '../src/config/ConfigValidator';

const OUTPUT_PATH = path.join(__dirname, '../schema/init-config.schema.json');

function generateSchema() {
  console.log('Generating JSON Schema from Zod...');

  const schemaWithMetadata = {
    title: 'InitConfig',
    description: 'Configuration accepted by SearchClient.create()',
    version: '1.0.0',
    ...configJsonSchema(),
  };

  fs.mkdirSync(path.dirname(OUTPUT_PATH), { recursive: true });
  fs.writeFileSync(OUTPUT_PATH, JSON.stringify(schemaWithMetadata, null, 2), 'utf-8');

  console.log(`JSON Schema generated: ${OUTPUT_PATH}`);
}

try {
  generateSchema();
  process.exit(0);
} catch (error: unknown) {
  const err = error instanceof Error ? error : new Error(String(error));
  console.error('Failed to generate JSON Schema:', err.message);
  if (err.stack) {
    console.error(err.stack);
  }
  process.exit(1);
}
