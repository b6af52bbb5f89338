/**
 * Generation Tracker
 * Unified tracking for stats and recovered issues
 */

import { ZodError } from "zod";
import type {
  Issue,
  IssueType,
  FileIssueReason,
  ResourceIssueReason,
  GenerationStats,
} from "../types";

// ============================================================================
// Error Mapping (private)
// ============================================================================

interface IssueInfo<T> {
  reason: T;
  details: string;
}

function mapResourceError(error: unknown): IssueInfo<ResourceIssueReason> {
  if (error instanceof ZodError) {
    return {
      reason: "schema-validation",
      details: error.issues
        .map((e) => (e.path.length > 0 ? `${e.path.map(String).join(".")}: ${e.message}` : e.message))
        .join("; "),
    };
  }
  if (error instanceof SyntaxError) {
    return {
      reason: "invalid-json",
      details: error.message,
    };
  }
  return {
    reason: "read-error",
    details: error instanceof Error ? error.message : String(error),
  };
}

function mapFileError(error: unknown): IssueInfo<FileIssueReason> {
  const details = error instanceof Error ? error.message : String(error);

  if (error instanceof Error && "code" in error) {
    if (error.code === "ENOENT") {
      return { reason: "not-found", details };
    }
    if (error.code === "EACCES" || error.code === "EPERM") {
      return { reason: "permission-denied", details };
    }
  }

  return { reason: "read-error", details };
}

// ============================================================================
// Tracker Class
// ============================================================================

export class Tracker {
  private totalFiles = 0;
  private extractedFiles = 0;
  private fallbackFiles = 0;
  private issues: Issue[] = [];
  private startTime = new Date();

  // ============================================================================
  // Stat counters
  // ============================================================================

  setTotalFiles(count: number): void {
    this.totalFiles = count;
  }

  incrementExtracted(): void {
    this.extractedFiles++;
  }

  incrementFallback(): void {
    this.fallbackFiles++;
  }

  // ============================================================================
  // Issue tracking
  // ============================================================================

  trackError(path: string, error: unknown, type: IssueType): void {
    switch (type) {
      case "file": {
        const { reason, details } = mapFileError(error);
        this.issues.push({ type: "file", path, reason, details });
        break;
      }
      case "resource": {
        const { reason, details } = mapResourceError(error);
        this.issues.push({ type: "resource", path, reason, details });
        break;
      }
    }
  }

  getIssues(type?: IssueType): Issue[] {
    if (!type) return this.issues;
    return this.issues.filter((i) => i.type === type);
  }

  // ============================================================================
  // Results
  // ============================================================================

  getStats(): GenerationStats {
    const duration = Date.now() - this.startTime.getTime();

    return {
      totalFiles: this.totalFiles,
      extractedFiles: this.extractedFiles,
      fallbackFiles: this.fallbackFiles,
      issues: this.issues,
      duration,
    };
  }
}
