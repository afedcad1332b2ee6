import { VALIDATION_CATEGORIES } from '../validation/types.js';
import type { ValidationCategory, ValidationResult, ValidationStatus } from '../validation/types.js';

export interface CategoryReport {
  category: ValidationCategory;
  status: ValidationStatus;
  message: string;
  results: ValidationResult[];
}

export interface ValidationReport {
  generatedAt: string;
  overallStatus: 'success' | 'failure';
  categories: CategoryReport[];
  failedCategories: ValidationCategory[];
  erroredCategories: ValidationCategory[];
}

const MAX_DETAIL_LINES = 3;
const RULE = '='.repeat(80);
const THIN_RULE = '-'.repeat(80);

const REMEDIATION: Record<ValidationCategory, string[]> = {
  temporal_consistency: [
    'Check lifecycle clamping so every completedAt falls after createdAt',
    'Pin "now" with --now so no timestamps are generated in the future',
    'Validate project timelines so endDate is never before startDate',
  ],
  referential_integrity: [
    'Generate parents before children so every foreign key resolves',
    'Check that assignees are drawn from users of the same organization',
    'Drop or re-link orphaned subtasks, comments and task-tag links',
    'Place each task in a section of its own project',
  ],
  distribution_similarity: [
    'Review the due-date offset buckets in segments.json',
    'Compare benchmark buckets in benchmarks.json with the generated ranges',
  ],
  completion_rates: [
    'Review department base rates and work-item type adjustments in segments.json',
  ],
  business_rules: [
    'Ensure every project receives at least one task',
    'Set completedAt on every completed task',
    'Use task name templates of at least three characters',
  ],
  data_quality: [
    'Fill required name and email fields',
    'De-duplicate user email addresses',
  ],
};

const ERROR_REMEDIATION = [
  'Check that the corpus file exists and is readable JSON',
  'Re-run generation to rewrite the corpus',
];

export function titleCase(key: string): string {
  return key
    .split('_')
    .map((w) => (w ? w[0].toUpperCase() + w.slice(1) : w))
    .join(' ');
}

function categoryStatus(results: ValidationResult[]): ValidationStatus {
  if (results.some((r) => r.status === 'failure')) return 'failure';
  if (results.some((r) => r.status === 'error')) return 'error';
  return 'success';
}

function hasError(results: readonly ValidationResult[]): boolean {
  return results.some((r) => r.status === 'error');
}

function categoryMessage(category: ValidationCategory, results: ValidationResult[]): string {
  if (results.length === 0) return `${titleCase(category)}: no segment had enough data to check`;
  if (results.length === 1) return results[0].message;
  const failing = results.filter((r) => r.status !== 'success').length;
  return `${titleCase(category)}: ${failing}/${results.length} segments outside tolerance`;
}

/**
 * Groups results by category. Any failing or errored category makes the
 * overall verdict `failure`. A category holding both kinds is listed as
 * failed and as errored.
 */
export function buildReport(results: readonly ValidationResult[], generatedAt: Date): ValidationReport {
  const categories: CategoryReport[] = VALIDATION_CATEGORIES.map((category) => {
    const own = results.filter((r) => r.category === category);
    return {
      category,
      status: categoryStatus(own),
      message: categoryMessage(category, own),
      results: own,
    };
  });

  const failedCategories = categories.filter((c) => c.status === 'failure').map((c) => c.category);
  const erroredCategories = categories.filter((c) => hasError(c.results)).map((c) => c.category);

  return {
    generatedAt: generatedAt.toISOString(),
    overallStatus: failedCategories.length + erroredCategories.length > 0 ? 'failure' : 'success',
    categories,
    failedCategories,
    erroredCategories,
  };
}

function segmentHint(result: ValidationResult): string | null {
  if (result.status !== 'failure') return null;
  if (result.category === 'completion_rates') {
    return (
      `Recalibrate completion-rate sampling for segment ${result.subject} ` +
      `(observed ${(result.metric * 100).toFixed(1)}%)`
    );
  }
  if (result.category === 'distribution_similarity') {
    return `Recalibrate ${String(result.details.metric ?? 'value')} sampling for segment ${result.subject}`;
  }
  return null;
}

export function suggestFixes(report: ValidationReport): Record<string, string[]> {
  if (report.overallStatus === 'success') {
    return { all: ['No fixes needed - all validations passed'] };
  }

  const fixes: Record<string, string[]> = {};
  for (const category of report.categories) {
    const items: string[] = [];
    if (category.status === 'failure') {
      items.push(...category.results.map(segmentHint).filter((h): h is string => h !== null));
      items.push(...REMEDIATION[category.category]);
    }
    if (hasError(category.results)) items.push(...ERROR_REMEDIATION);
    if (items.length > 0) fixes[category.category] = items;
  }
  return fixes;
}

function detailLines(category: CategoryReport): string[] {
  const lines: string[] = [];
  if (category.results.length === 1) {
    for (const [key, value] of Object.entries(category.results[0].details)) {
      lines.push(`  - ${titleCase(key)}: ${String(value)}`);
    }
    return lines;
  }
  if (category.results.length > 1) {
    lines.push('  Details:');
    for (const result of category.results.slice(0, MAX_DETAIL_LINES)) {
      lines.push(`    • [${result.status}] ${result.message}`);
    }
    if (category.results.length > MAX_DETAIL_LINES) {
      lines.push(`    • ... and ${category.results.length - MAX_DETAIL_LINES} more`);
    }
  }
  return lines;
}

export function renderText(report: ValidationReport): string {
  const lines: string[] = [
    RULE,
    'DATA VALIDATION REPORT',
    RULE,
    `Generated: ${report.generatedAt}`,
    `Overall Status: ${report.overallStatus.toUpperCase()}`,
    THIN_RULE,
  ];

  for (const category of report.categories) {
    lines.push('');
    lines.push(`${titleCase(category.category)}: ${category.status.toUpperCase()}`);
    lines.push(`  ${category.message}`);
    lines.push(...detailLines(category));
  }

  const flagged = [...new Set([...report.failedCategories, ...report.erroredCategories])];
  if (flagged.length > 0) {
    lines.push('');
    lines.push(THIN_RULE);
    lines.push('FAILED CATEGORIES:');
    for (const category of flagged) {
      lines.push(`  • ${titleCase(category)}`);
    }
  }

  lines.push('');
  lines.push(RULE);
  return lines.join('\n');
}

export function renderMarkdown(report: ValidationReport): string {
  const lines: string[] = [
    '# Validation Report',
    '',
    `**Generated:** ${report.generatedAt}`,
    `**Overall Status:** ${report.overallStatus}`,
    '',
  ];

  for (const category of report.categories) {
    lines.push(`## ${titleCase(category.category)}`);
    lines.push('');
    lines.push(`**Status:** ${category.status} | ${category.message}`);
    lines.push('');
    if (category.results.length > 1) {
      lines.push('| Subject | Status | Metric | Threshold | Samples |');
      lines.push('| --- | --- | --- | --- | --- |');
      for (const r of category.results) {
        lines.push(`| ${r.subject} | ${r.status} | ${r.metric.toFixed(4)} | ${r.threshold} | ${r.sampleSize} |`);
      }
      lines.push('');
    }
  }

  const fixes = suggestFixes(report);
  lines.push('## Suggested Fixes');
  lines.push('');
  for (const [category, items] of Object.entries(fixes)) {
    lines.push(`### ${titleCase(category)}`);
    for (const item of items) {
      lines.push(`- ${item}`);
    }
    lines.push('');
  }

  return lines.join('\n');
}
