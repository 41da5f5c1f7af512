import { id } from 'ethers';
import type { EventDefinition, EventMatch } from '../core/types.js';
import { parseEventDefinitions } from './definitions.js';

export interface EventDescription {
  name: string;
  signature: string;
  topic: string;
}

/**
 * Builds `name(type1,type2,...)` over every input, indexed or not.
 */
export function canonicalSignature(definition: EventDefinition): string {
  const types = definition.inputs.map((input) => input.type);
  return `${definition.name}(${types.join(',')})`;
}

/**
 * Keccak-256 of the signature's UTF-8 bytes as lowercase 0x-prefixed hex
 */
export function signatureHash(signature: string): string {
  return id(signature);
}

/**
 * Finds the first definition, in ABI order, whose signature hash equals
 * the log's leading topic.
 */
export function matchEvent(
  topic0: string,
  definitions: readonly EventDefinition[]
): EventMatch | null {
  for (const definition of definitions) {
    const signature = canonicalSignature(definition);
    if (signatureHash(signature) === topic0) {
      return { definition, signature };
    }
  }
  return null;
}

/**
 * Lists every event in the ABI with its signature and topic hash.
 * Returns an empty list for ABI text that does not parse.
 */
export function describeEvents(abiText: string): EventDescription[] {
  const definitions = parseEventDefinitions(abiText) ?? [];
  return definitions.map((definition) => {
    const signature = canonicalSignature(definition);
    return {
      name: definition.name,
      signature,
      topic: signatureHash(signature),
    };
  });
}
