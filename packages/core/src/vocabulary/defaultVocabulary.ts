/**
 * Synonym table: lower-cased, trimmed raw label -> canonical aspect label.
 */
export type SynonymTable = Readonly<Record<string, string>>;

/**
 * Labels exported by the two labelers for the same aspect. Covers spacing
 * variants ("material/ quality"), reordered pairs ("fit/sizing") and
 * "style", which reviewers use for Color/Aesthetics.
 */
export const DEFAULT_SYNONYMS: SynonymTable = Object.freeze({
  'material/ quality': 'Material/Quality',
  'material/quality': 'Material/Quality',
  'sizing/fit': 'Sizing/Fit',
  'fit/sizing': 'Sizing/Fit',
  comfort: 'Comfort',
  style: 'Color/Aesthetics',
  'color/aesthetics': 'Color/Aesthetics',
  durability: 'Durability',
  'shipping/packaging': 'Shipping/Packaging',
  'instruction/ ux': 'Instructions/UX',
  'instructions/ux': 'Instructions/UX',
  'value/price': 'Value/Price',
});
