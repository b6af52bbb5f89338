/**
 * Issue and statistics types produced by the Tracker
 */

export type IssueType = "file" | "resource";

export type FileIssueReason =
  | "not-found"
  | "permission-denied"
  | "read-error";

export type ResourceIssueReason =
  | "schema-validation"
  | "invalid-json"
  | "read-error";

export interface FileIssue {
  type: "file";
  path: string;
  reason: FileIssueReason;
  details?: string;
}

export interface ResourceIssue {
  type: "resource";
  path: string;
  reason: ResourceIssueReason;
  details?: string;
}

export type Issue = FileIssue | ResourceIssue;

export interface GenerationStats {
  totalFiles: number;
  extractedFiles: number; // Metadata read from the file itself
  fallbackFiles: number; // Listed with a filename-derived title only
  issues: Issue[];
  duration: number; // Milliseconds since the tracker was created
}
