import { z } from 'zod';
import type { EventDefinition } from '../core/types.js';

const ParameterSchema = z.object({
  name: z.string().default(''),
  type: z.string(),
  indexed: z.boolean().default(false),
});

const EventSchema = z.object({
  type: z.literal('event'),
  name: z.string(),
  inputs: z.array(ParameterSchema).default([]),
});

const EntrySchema = z.object({ type: z.unknown() }).passthrough();

/**
 * Parses ABI text into its event definitions, in ABI order.
 * Entries of any other type are skipped without inspection.
 * @returns the definitions, or null when the text is not a JSON array of
 * entries or an event entry is missing its name or a parameter type
 */
export function parseEventDefinitions(abiText: string): EventDefinition[] | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(abiText);
  } catch {
    return null;
  }

  if (!Array.isArray(parsed)) {
    return null;
  }

  const definitions: EventDefinition[] = [];
  for (const entry of parsed) {
    const item = EntrySchema.safeParse(entry);
    if (!item.success || item.data.type !== 'event') {
      continue;
    }

    const event = EventSchema.safeParse(entry);
    if (!event.success) {
      return null;
    }

    definitions.push({
      name: event.data.name,
      inputs: event.data.inputs,
    });
  }

  return definitions;
}
