export type RuleKind = 'guideline' | 'style_guide';

export interface GuidelineContent {
  readonly condition: string;
  readonly action: string;
}

export type StyleGuideEventSource = 'customer' | 'ai_agent' | 'human_agent' | 'system';

export interface StyleGuideEvent {
  readonly source: StyleGuideEventSource;
  readonly message: string;
}

export interface StyleGuideExample {
  readonly before: readonly StyleGuideEvent[];
  readonly after: readonly StyleGuideEvent[];
  readonly violation: string;
}

export interface StyleGuideContent {
  readonly principle: string;
  readonly examples: readonly StyleGuideExample[];
}

export interface StoredRule<C> {
  readonly id: string;
  readonly ownerId: string;
  readonly content: C;
  readonly createdAt: Date;
}

export type Guideline = StoredRule<GuidelineContent>;
export type StyleGuide = StoredRule<StyleGuideContent>;

export type ConnectionKind = 'entails' | 'suggests';

export interface GuidelineConnection {
  readonly id: string;
  readonly source: string;
  readonly target: string;
  readonly kind: ConnectionKind;
  readonly createdAt: Date;
}
