/**
 * Bias spectrum projections and credibility labels
 */

import type { Article, BiasRange, BiasSpectrum, StoryGroup } from './types';

const SPECTRUM_VALUES: Record<BiasSpectrum, number> = {
  'Far Left': -2.0,
  'Left': -1.5,
  'Center-Left': -0.7,
  'Center': 0.0,
  'Center-Right': 0.7,
  'Right': 1.5,
  'Far Right': 2.0,
};

const SHORT_LABELS: Record<BiasSpectrum, string> = {
  'Far Left': 'FL',
  'Left': 'L',
  'Center-Left': 'CL',
  'Center': 'C',
  'Center-Right': 'CR',
  'Right': 'R',
  'Far Right': 'FR',
};

/** Numeric projection in [-2.0, +2.0] */
export function biasValue(spectrum: BiasSpectrum): number {
  return SPECTRUM_VALUES[spectrum];
}

export function biasShortLabel(spectrum: BiasSpectrum): string {
  return SHORT_LABELS[spectrum];
}

export function spectrumFromValue(value: number): BiasSpectrum {
  if (value < -1.75) return 'Far Left';
  if (value < -1.0) return 'Left';
  if (value < -0.3) return 'Center-Left';
  if (value <= 0.3) return 'Center';
  if (value < 1.0) return 'Center-Right';
  if (value < 1.75) return 'Right';
  return 'Far Right';
}

export function credibilityLabel(credibility: number): 'High' | 'Good' | 'Fair' | 'Low' {
  if (credibility >= 90) return 'High';
  if (credibility >= 75) return 'Good';
  if (credibility >= 60) return 'Fair';
  return 'Low';
}

/**
 * Min/max/mean over members that carry a bias rating. Unrated members are
 * left out rather than counted as zero.
 */
export function computeBiasRange(articles: Article[]): BiasRange | null {
  const values: number[] = [];
  for (const article of articles) {
    if (article.bias) values.push(biasValue(article.bias.spectrum));
  }
  if (values.length === 0) return null;

  const sum = values.reduce((acc, v) => acc + v, 0);
  return {
    min: Math.min(...values),
    max: Math.max(...values),
    mean: sum / values.length,
  };
}

/**
 * e.g. "2L / 1C / 0R". Unrated members count toward center.
 */
export function biasDistribution(group: StoryGroup): string {
  let left = 0;
  let center = 0;
  let right = 0;

  for (const article of group.articles) {
    const value = article.bias ? biasValue(article.bias.spectrum) : 0;
    if (value < -0.3) left++;
    else if (value > 0.3) right++;
    else center++;
  }

  return `${left}L / ${center}C / ${right}R`;
}
