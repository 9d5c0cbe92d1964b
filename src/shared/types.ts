/** Placeholder written into every string field that has no usable value. */
export const NOT_SPECIFIED = "Not specified";

/** Severity levels */
export const SEVERITIES = ["Low", "Moderate", "High"] as const;
export type Severity = (typeof SEVERITIES)[number];

/** Urgency / customer priority levels */
export const URGENCIES = ["Routine", "Soon", "Immediate"] as const;
export type Urgency = (typeof URGENCIES)[number];

/** Roof systems the derivation engine recognizes. Advisory for manual entry. */
export const ROOF_SYSTEMS = [
  "TPO",
  "EPDM",
  "PVC",
  "SBS modified bitumen",
  "BUR",
  "Metal",
  "Shingle",
] as const;

/** Primary issue vocabulary offered on the manual path. */
export const PRIMARY_ISSUES = [
  "Active leak",
  "Ponding",
  "Open seam/lap",
  "Flashing concern",
  "Puncture/tear",
  "Clogged drain/scupper",
  "Debris",
  "Moisture concern",
  "Adhesion/install limitation",
] as const;

/** Location vocabulary offered on the manual path. Free text is also accepted. */
export const LOCATIONS = [
  "Field of roof",
  "At drain / scupper",
  "At penetration",
  "At curb / RTU",
  "At perimeter / edge",
  "At wall / parapet",
  "At seam / lap",
  "Interior (ceiling)",
] as const;

/** Closed classification of free-text primary issues */
export const ISSUE_CATEGORIES = [
  "ActiveLeak",
  "Ponding",
  "OpenSeam",
  "Flashing",
  "Puncture",
  "ClogDrain",
  "Debris",
  "Moisture",
  "Adhesion",
  "Blistering",
  "MechanicalDamage",
  "Unclassified",
] as const;
export type IssueCategory = (typeof ISSUE_CATEGORIES)[number];

/** Run modes: offline never calls the note extractor. */
export type RunMode = "offline" | "live";

/** Decision trace step types */
export type TraceType =
  | "NORMALIZATION"
  | "MANUAL_ENTRY"
  | "DERIVATION"
  | "CONSISTENCY_CHECK"
  | "REPORT_RENDER"
  | "EXPORT_GENERATION";

/** One hash-chained decision trace entry */
export interface TraceRecord {
  traceId: string;
  sessionId: string;
  traceType: TraceType;
  chainPosition: number;
  initiatedAt: string;
  completedAt: string;
  durationMs: number;
  inputHash: string | null;
  reasoningChain: {
    steps: Array<{ stepNumber: number; action: string; detail: string }>;
  };
  outputContent: Record<string, unknown>;
  validationResults: {
    pass: boolean;
    messages: string[];
  };
  hashChain: {
    contentHash: string;
    previousHash: string | null;
    merkleRoot: string;
  };
}
