import type {
  ConnectionProposition,
  Evaluation,
  GuidelineCoherenceCheck,
  GuidelinePayload,
  Invoice,
  StyleGuideCoherenceCheck,
  StyleGuidePayload,
} from '@tenet/shared/src/types/evaluation.types.js';
import type {
  Guideline,
  GuidelineConnection,
  GuidelineContent,
  StyleGuide,
  StyleGuideContent,
  StyleGuideEvent,
} from '@tenet/shared/src/types/rule.types.js';
import type {
  EvaluationResponse,
  GuidelineConnectionResponse,
  GuidelineResponse,
  StyleGuideResponse,
} from './schemas/responses.js';

// Response bodies are plain JSON: dates become ISO strings and every
// readonly array is copied.

function guidelineContentDto(content: GuidelineContent) {
  return { condition: content.condition, action: content.action };
}

function eventsDto(events: readonly StyleGuideEvent[]) {
  return events.map((e) => ({ source: e.source, message: e.message }));
}

function styleGuideContentDto(content: StyleGuideContent) {
  return {
    principle: content.principle,
    examples: content.examples.map((example) => ({
      before: eventsDto(example.before),
      after: eventsDto(example.after),
      violation: example.violation,
    })),
  };
}

function guidelinePayloadDto(payload: GuidelinePayload) {
  return { ...payload, content: guidelineContentDto(payload.content) };
}

function styleGuidePayloadDto(payload: StyleGuidePayload) {
  return { ...payload, content: styleGuideContentDto(payload.content) };
}

function guidelineCheckDto(check: GuidelineCoherenceCheck) {
  return {
    ...check,
    first: guidelineContentDto(check.first),
    second: guidelineContentDto(check.second),
  };
}

function styleGuideCheckDto(check: StyleGuideCoherenceCheck) {
  return {
    ...check,
    first: styleGuideContentDto(check.first),
    second: styleGuideContentDto(check.second),
  };
}

function propositionDto(proposition: ConnectionProposition) {
  return {
    ...proposition,
    source: guidelineContentDto(proposition.source),
    target: guidelineContentDto(proposition.target),
  };
}

function invoiceDto(invoice: Invoice): EvaluationResponse['invoices'][number] {
  switch (invoice.kind) {
    case 'guideline':
      return {
        ...invoice,
        payload: guidelinePayloadDto(invoice.payload),
        data: invoice.data && {
          kind: invoice.data.kind,
          coherenceChecks: invoice.data.coherenceChecks.map(guidelineCheckDto),
          connectionPropositions: invoice.data.connectionPropositions?.map(propositionDto) ?? null,
        },
      };
    case 'style_guide':
      return {
        ...invoice,
        payload: styleGuidePayloadDto(invoice.payload),
        data: invoice.data && {
          kind: invoice.data.kind,
          coherenceChecks: invoice.data.coherenceChecks.map(styleGuideCheckDto),
        },
      };
  }
}

export function toEvaluationResponse(evaluation: Evaluation): EvaluationResponse {
  return {
    id: evaluation.id,
    ownerId: evaluation.ownerId,
    createdAt: evaluation.createdAt.toISOString(),
    status: evaluation.status,
    error: evaluation.error,
    invoices: evaluation.invoices.map(invoiceDto),
    progress: evaluation.progress,
  };
}

export function toGuidelineResponse(guideline: Guideline): GuidelineResponse {
  return {
    id: guideline.id,
    ownerId: guideline.ownerId,
    content: guidelineContentDto(guideline.content),
    createdAt: guideline.createdAt.toISOString(),
  };
}

export function toStyleGuideResponse(styleGuide: StyleGuide): StyleGuideResponse {
  return {
    id: styleGuide.id,
    ownerId: styleGuide.ownerId,
    content: styleGuideContentDto(styleGuide.content),
    createdAt: styleGuide.createdAt.toISOString(),
  };
}

export function toConnectionResponse(connection: GuidelineConnection): GuidelineConnectionResponse {
  return {
    id: connection.id,
    source: connection.source,
    target: connection.target,
    kind: connection.kind,
    createdAt: connection.createdAt.toISOString(),
  };
}
