import type { AuditReportInput } from './types';

const RULE = '='.repeat(80);
const THIN_RULE = '─'.repeat(80);

function pct(value: number, width = 6): string {
  return value.toFixed(2).padStart(width);
}

function count(value: number): string {
  return String(value).padStart(3);
}

/**
 * Results summary printed after the row-level report is written.
 * Returns lines so callers decide where they go.
 */
export function renderSummary(input: AuditReportInput): string[] {
  const { aggregate, reference, candidate } = input;
  const { totals } = aggregate;
  const ref = reference.name;
  const cand = candidate.name;

  return [
    '',
    RULE,
    'RESULTS SUMMARY',
    RULE,
    '',
    `Reviews Evaluated: ${aggregate.reviewCount}`,
    `Total ${ref} Aspects: ${reference.aspects}`,
    `Total ${cand} Aspects: ${candidate.aspects}`,
    '',
    'Aspect Detection Performance:',
    `  True Positives (TP):  ${count(totals.truePositives)} - Aspects ${cand} correctly identified`,
    `  False Negatives (FN): ${count(totals.falseNegatives)} - ${ref} aspects ${cand} missed`,
    `  False Positives (FP): ${count(totals.falsePositives)} - ${cand} aspects ${ref} didn't label`,
    '',
    THIN_RULE,
    'MACRO-AVERAGED METRICS (average per review):',
    THIN_RULE,
    `  Recall:    ${pct(aggregate.macroRecall)}% - Did ${cand} catch ${ref} aspects?`,
    `  Precision: ${pct(aggregate.macroPrecision)}% - Were ${cand} aspects correct?`,
    `  F1-Score:  ${pct(aggregate.macroF1)}% - Overall performance`,
    '',
    THIN_RULE,
    'MICRO-AVERAGED METRICS (aggregate all aspects):',
    THIN_RULE,
    `  Recall:    ${pct(aggregate.microRecall)}%`,
    `  Precision: ${pct(aggregate.microPrecision)}%`,
    `  F1-Score:  ${pct(aggregate.microF1)}%`,
  ];
}

export function renderDecision(input: AuditReportInput): string[] {
  const { aggregate, threshold, outputPath } = input;
  const ref = input.reference.name;
  const cand = input.candidate.name;
  const scoreLine = `Micro F1-Score: ${aggregate.microF1.toFixed(2)}% (Threshold: ≥${threshold}%)`;

  if (input.decision === 'pass') {
    return [
      '',
      RULE,
      `✅ DECISION: GREEN LIGHT - ${cand.toUpperCase()} MEETS THE THRESHOLD`,
      RULE,
      '',
      scoreLine,
      '',
      'Interpretation:',
      `  - ${cand} catches ${aggregate.microRecall.toFixed(1)}% of all aspects ${ref} labeled`,
      `  - ${aggregate.microPrecision.toFixed(1)}% of ${cand} aspects are accurate`,
      '',
      'Next Steps:',
      `  1. ✅ Proceed with ${cand} labels`,
      '  2. 📊 Record these metrics alongside the labeling run',
      '  3. 📈 Re-audit periodically to catch drift',
    ];
  }

  const lines = [
    '',
    RULE,
    `🚨 DECISION: RED FLAG - ${cand.toUpperCase()} IS BELOW THE THRESHOLD`,
    RULE,
    '',
    scoreLine,
    '',
    'Interpretation:',
    `  - ${cand} only catches ${aggregate.microRecall.toFixed(1)}% of ${ref} aspects`,
    `  - Only ${aggregate.microPrecision.toFixed(1)}% of ${cand} aspects are accurate`,
    '',
    'Action Required:',
    '  1. 🚨 Escalate before relying on these labels',
    `  2. 📁 Review ${outputPath} for failure patterns`,
    '  3. 🔧 Refine the labeling prompt or vocabulary and re-run the audit',
    `  4. ⛔ Do not use ${cand} labels in production`,
  ];

  if (input.worstCases.length > 0) {
    lines.push('', `Worst Performing Reviews (F1 < ${input.worstCaseF1Below.toFixed(2)}):`);
    for (const worst of input.worstCases) {
      lines.push(`  ${worst.reviewId}: F1=${worst.f1} - ${worst.detail}`);
    }
  }

  return lines;
}

export function renderFooter(outputPath: string): string[] {
  return ['', RULE, '', `📁 Full results saved to: ${outputPath}`, RULE, ''];
}
