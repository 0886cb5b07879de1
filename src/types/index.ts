export type RawItemKind = 'comment' | 'post';

export interface RawItem {
  /** Reddit fullname, e.g. `t1_abc123` for a comment or `t3_xyz789` for a post. */
  id: string;
  kind: RawItemKind;
  author: string | null;
  body: string;
  title?: string;
  parentId: string | null;
  createdUtc: number;
  score: number;
}

export type ParentResolution =
  | { status: 'found'; item: RawItem }
  | { status: 'missing' }
  | { status: 'failed'; reason: string };

export type ParentLookup = (parentId: string) => ParentResolution;

export type ParentKind = RawItemKind | 'unavailable';

export interface Exchange {
  readonly commentId: string;
  readonly replyBody: string;
  readonly parentBody: string;
  readonly parentKind: ParentKind;
  readonly parentLabel: string;
  readonly score: number;
  readonly createdUtc: number;
  /** Position of the comment in the upstream listing. */
  readonly order: number;
}

export interface ParticipantLabel {
  identity: string;
  label: string;
}

export type ExchangeOrder = 'recent' | 'score';

export type FilterReason =
  | 'not-target'
  | 'empty'
  | 'deleted'
  | 'too-short'
  | 'too-long'
  | 'parent-too-short'
  | 'parent-too-long'
  | 'block-too-long';

export type DefinitionWarning =
  | { kind: 'self-reply'; commentId: string; parentId: string }
  | { kind: 'parent-unavailable'; commentId: string; parentId: string | null }
  | { kind: 'parent-unresolved'; commentId: string; parentId: string; reason: string }
  | { kind: 'filtered'; commentId: string; reason: FilterReason }
  | { kind: 'truncated'; included: number; excluded: number }
  | { kind: 'no-exchanges' };

export type WarningKind = DefinitionWarning['kind'];

export interface AssembledDefinition {
  text: string;
  length: number;
  maxChars: number;
  includedExchanges: number;
  totalExchanges: number;
  truncated: boolean;
  labels: ParticipantLabel[];
  warnings: DefinitionWarning[];
}
