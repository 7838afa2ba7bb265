import type {
  GuidelineContent,
  StyleGuideContent,
  StyleGuideEvent,
} from '../types/rule.types.js';

// Rebuilt with a fixed key order so equal content always serializes identically.

export function canonicalGuideline(content: GuidelineContent): GuidelineContent {
  return { condition: content.condition, action: content.action };
}

function canonicalEvents(events: readonly StyleGuideEvent[]): StyleGuideEvent[] {
  return events.map((e) => ({ source: e.source, message: e.message }));
}

export function canonicalStyleGuide(content: StyleGuideContent): StyleGuideContent {
  return {
    principle: content.principle,
    examples: content.examples.map((example) => ({
      before: canonicalEvents(example.before),
      after: canonicalEvents(example.after),
      violation: example.violation,
    })),
  };
}

/** Structural identity of a guideline: equal keys mean equal content. */
export function guidelineKey(content: GuidelineContent): string {
  return JSON.stringify(canonicalGuideline(content));
}

/** Structural identity of a style guide: principle plus every example. */
export function styleGuideKey(content: StyleGuideContent): string {
  return JSON.stringify(canonicalStyleGuide(content));
}
