import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import type { Env } from './config.js';

export type SetupContext = 'missing' | 'invalid' | 'unknown';

const blockSchema = z.object({
  header: z.string(),
  diagnosis: z.string(),
  step1: z.string(),
});

const messagesSchema = z.object({
  setup: z.object({
    missing: blockSchema,
    invalid: blockSchema,
    unknown: blockSchema,
    config_instructions: z.string(),
    footer: z.string(),
  }),
});

type SetupMessages = z.infer<typeof messagesSchema>;

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const yamlPath = join(__dirname, '..', 'messages.yaml');

let _cached: SetupMessages | null = null;
function loadMessages(): SetupMessages {
  if (_cached) return _cached;
  _cached = messagesSchema.parse(parseYaml(readFileSync(yamlPath, 'utf-8')));
  return _cached;
}

export function detectSetupContext(env: Env = process.env): SetupContext {
  const hasKey = !!env.MEMPHORA_API_KEY?.trim();
  const hasUser = !!env.MEMPHORA_USER_ID?.trim();
  if (!hasKey || !hasUser) return 'missing';
  return 'invalid';
}

export function getSetupErrorMessage(errorDetail: string, context?: SetupContext): string {
  const ctx = context ?? detectSetupContext();
  const msgs = loadMessages();
  const block = msgs.setup[ctx];

  const header = block.header.replace('{error}', errorDetail);
  const diagnosis = block.diagnosis.trim() ? `**Diagnosis:** ${block.diagnosis.trim()}\n\n` : '';

  return (
    `${header}\n\n` +
    diagnosis +
    '## How to fix\n\n' +
    `1. ${block.step1}\n` +
    '2. **Set your credentials** (pick one):\n\n' +
    msgs.setup.config_instructions +
    `3. ${msgs.setup.footer}`
  );
}
