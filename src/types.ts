export type MediaKind = "image" | "video";

/** Structured result of one content-description call. */
export interface Description {
  readonly description: string;
  readonly scene?: string;
  readonly subjects: readonly string[];
  readonly location?: string;
  readonly action?: string;
  /** false when the text came from a fallback rather than the model */
  readonly analyzed: boolean;
}

export interface MediaAsset {
  readonly path: string;
  readonly name: string;
  readonly size: number;
  readonly kind: MediaKind;
  readonly modifiedAt: Date;
  description?: Description;
}

export type ExclusionReason = "unsupported-type" | "too-large" | "not-a-file";

export interface ExcludedFile {
  readonly path: string;
  readonly reason: ExclusionReason;
  readonly size?: number;
}

export type PatternToken =
  | { readonly type: "literal"; readonly text: string }
  | { readonly type: "placeholder"; readonly name: string };

export interface NamingPattern {
  readonly source: string;
  readonly tokens: readonly PatternToken[];
}

export type FieldMap = Readonly<Record<string, string>>;

export type PlanStatus =
  | "proposed"
  | "resolved"
  | "unchanged"
  | "applied"
  | "failed"
  | "rolled-back";

export interface NamePlan {
  readonly asset: MediaAsset;
  readonly proposedName: string;
  finalName: string;
  targetPath: string;
  status: PlanStatus;
  error?: string;
}

export type BatchStatus =
  | "pending"
  | "scanning"
  | "describing"
  | "planning"
  | "awaiting-confirmation"
  | "applying"
  | "committed"
  | "partially-failed"
  | "rolled-back"
  | "cancelled";

export interface BackupRecord {
  readonly batchId: string;
  readonly originalPath: string;
  readonly newPath: string;
  readonly timestamp: string;
  readonly backedUp: boolean;
  readonly backupPath?: string;
  readonly size: number;
  /** sha256 of the bytes at rename time */
  readonly checksum: string;
}

export type AssetOutcome =
  | "excluded"
  | "description-failed"
  | "planned"
  | "unchanged"
  | "applied"
  | "failed"
  | "rolled-back"
  | "cancelled";

export interface AssetReport {
  readonly path: string;
  readonly outcome: AssetOutcome;
  readonly finalName?: string;
  readonly detail?: string;
}

export interface BatchSummary {
  readonly batchId: string;
  readonly status: BatchStatus;
  readonly outputDir: string;
  readonly pattern: string;
  readonly counts: Readonly<Record<AssetOutcome, number>>;
  readonly assets: readonly AssetReport[];
  readonly records: readonly BackupRecord[];
}

export type BatchEvent =
  | { type: "status"; status: BatchStatus }
  | { type: "describe.progress"; done: number; total: number; path: string }
  | { type: "describe.retry"; path: string; attempt: number; delayMs: number }
  | { type: "apply.progress"; done: number; total: number; path: string };

export type OnBatchEvent = (event: BatchEvent) => void;
