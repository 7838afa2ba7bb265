import type {
  GuidelineContent,
  StyleGuideContent,
  StyleGuideEvent,
} from '@tenet/shared/src/types/rule.types.js';

export function formatGuideline(content: GuidelineContent): string {
  return `When ${content.condition}, then ${content.action}`;
}

function formatEvents(events: readonly StyleGuideEvent[]): string {
  return events.map((e) => `    ${e.source}: ${e.message}`).join('\n');
}

export function formatStyleGuide(content: StyleGuideContent): string {
  const examples = content.examples.map(
    (example, i) =>
      `  Example ${String(i + 1)}:\n   Before:\n${formatEvents(example.before)}\n   After:\n${formatEvents(example.after)}\n   Violation: ${example.violation}`,
  );
  return [`Principle: ${content.principle}`, ...examples].join('\n');
}

export function formatNumbered<C>(
  items: readonly C[],
  format: (item: C) => string,
  firstId: number,
): string {
  return items.map((item, i) => `[${String(firstId + i)}] ${format(item)}`).join('\n');
}
