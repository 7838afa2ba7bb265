import { createHash } from 'node:crypto';
import type { Invoice, Payload } from '../types/evaluation.types.js';
import { canonicalGuideline, canonicalStyleGuide } from './rule-content.js';

function canonicalPayload(payload: Payload): Record<string, unknown> {
  switch (payload.kind) {
    case 'guideline':
      return {
        kind: payload.kind,
        content: canonicalGuideline(payload.content),
        operation: payload.operation,
        updatedId: payload.updatedId ?? null,
        coherenceCheck: payload.coherenceCheck,
        connectionProposition: payload.connectionProposition,
      };
    case 'style_guide':
      return {
        kind: payload.kind,
        content: canonicalStyleGuide(payload.content),
        operation: payload.operation,
        updatedId: payload.updatedId ?? null,
        coherenceCheck: payload.coherenceCheck,
      };
  }
}

/** MD5 hex digest of the payload's canonical JSON form. */
export function computePayloadChecksum(payload: Payload): string {
  return createHash('md5').update(JSON.stringify(canonicalPayload(payload))).digest('hex');
}

/** Unapproved, data-less invoice recorded when an evaluation is created. */
export function createPendingInvoice(payload: Payload): Invoice {
  const checksum = computePayloadChecksum(payload);

  switch (payload.kind) {
    case 'guideline':
      return { kind: 'guideline', payload, checksum, approved: false, data: null, error: null };
    case 'style_guide':
      return { kind: 'style_guide', payload, checksum, approved: false, data: null, error: null };
  }
}
