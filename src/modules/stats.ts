/**
 * Stats Module
 * Displays the run summary and recovered issues
 */

import chalk from "chalk";
import type {
  GenerationStats,
  GeneratorContext,
  Issue,
  SnippetEntry,
} from "../types";

// ============================================================================
// Formatting Helpers
// ============================================================================

/**
 * Format duration in a human-readable way
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  const seconds = ms / 1000;
  if (seconds < 60) {
    return `${seconds.toFixed(2)}s`;
  }
  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = (seconds % 60).toFixed(0);
  return `${minutes}m ${remainingSeconds}s`;
}

/**
 * Format a stat row with icon, label and value
 */
function statRow(
  icon: string,
  label: string,
  value: string | number,
  color: (s: string) => string = chalk.white,
): string {
  return `   ${icon} ${chalk.dim(label.padEnd(12))} ${color(String(value))}`;
}

function sectionHeader(title: string): string {
  return `\n  ${chalk.bold.white(title)}`;
}

// ============================================================================
// Main Stats Display
// ============================================================================

/**
 * Display the generation summary to console
 */
export function stats(ctx: GeneratorContext): void {
  const { tracker, verbose, outputPath, written } = ctx;
  const summary = tracker.getStats();
  const hasWarnings = summary.issues.length > 0;

  console.log("");

  const statusIcon = hasWarnings ? chalk.yellow("◆") : chalk.green("✔");
  const heading = written ? "Index Generated" : "Index Rendered (dry run)";

  console.log(
    `  ${statusIcon} ${chalk.bold(heading)} ${chalk.dim("·")} ${chalk.dim(formatDuration(summary.duration))}`,
  );

  displaySnippetsSection(summary, verbose ? ctx.entries : undefined);

  if (outputPath) {
    console.log(sectionHeader("Output"));
    console.log(`   ${chalk.cyan(outputPath)}`);
  }

  displayIssuesSection(summary.issues, verbose);

  console.log("");
}

// ============================================================================
// Section Displays
// ============================================================================

function displaySnippetsSection(
  summary: GenerationStats,
  entries?: SnippetEntry[],
): void {
  console.log(sectionHeader("Snippets"));

  console.log(
    statRow(chalk.green("◉"), "Listed", summary.totalFiles, chalk.green),
  );

  if (summary.fallbackFiles > 0) {
    console.log(
      statRow(chalk.yellow("◉"), "Fallback", summary.fallbackFiles, chalk.yellow),
    );
  }

  if (entries) {
    for (const entry of entries) {
      console.log(`      ${chalk.dim("·")} ${entry.filename}: ${entry.title}`);
    }
  }
}

function displayIssuesSection(issues: Issue[], verbose?: boolean): void {
  if (issues.length === 0) {
    return;
  }

  console.log(sectionHeader(chalk.yellow("Warnings")));

  const fileIssues = issues.filter((issue) => issue.type === "file");
  const resourceIssues = issues.filter((issue) => issue.type === "resource");

  if (fileIssues.length > 0) {
    console.log(
      statRow(chalk.yellow("✖"), "Unreadable", fileIssues.length, chalk.yellow),
    );
  }

  if (resourceIssues.length > 0) {
    console.log(
      statRow(chalk.yellow("✖"), "Config", resourceIssues.length, chalk.yellow),
    );
  }

  // File issues are listed only in verbose mode
  for (const issue of issues) {
    if (issue.type === "file" && !verbose) continue;
    console.log(`      ${chalk.dim("·")} ${issue.path} ${chalk.dim(`(${issue.reason})`)}`);
    if (issue.details) {
      console.log(`        ${chalk.dim(issue.details)}`);
    }
  }
}
