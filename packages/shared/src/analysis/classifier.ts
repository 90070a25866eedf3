/**
 * Document Type Classifier
 *
 * Keyword-frequency heuristic distinguishing new VPN requests from VPN
 * extensions. Pure: identical text always yields an identical verdict.
 */

import type { TypeVerdict } from '../types';

/**
 * Phrases found on new-access request forms (matched case-insensitively)
 */
export const NEW_REQUEST_KEYWORDS: readonly string[] = [
  'permohonan vpn baru',
  'request vpn baru',
  'pengajuan vpn baru',
  'new vpn request',
  'vpn baru',
  'permohonan akses vpn',
];

/**
 * Phrases found on extension / renewal forms
 */
export const EXTENSION_KEYWORDS: readonly string[] = [
  'perpanjangan vpn',
  'vpn extension',
  'perpanjangan akses vpn',
  'extend vpn',
  'renewal vpn',
  'perpanjangan',
];

export const UNKNOWN_CONFIDENCE = 0.3;

/**
 * Count non-overlapping occurrences of a needle in a haystack
 */
export function countOccurrences(haystack: string, needle: string): number {
  if (!needle) return 0;

  let count = 0;
  let index = haystack.indexOf(needle);
  while (index !== -1) {
    count++;
    index = haystack.indexOf(needle, index + needle.length);
  }
  return count;
}

function score(text: string, keywords: readonly string[]): number {
  return keywords.reduce((sum, keyword) => sum + countOccurrences(text, keyword), 0);
}

function confidenceFor(winningScore: number): number {
  // Rounded to avoid 0.5 + 0.30000000000000004
  return Math.min(0.9, Math.round((0.5 + 0.1 * winningScore) * 1000) / 1000);
}

export class DocumentTypeClassifier {
  classify(rawText: string): TypeVerdict {
    const text = rawText.toLowerCase();
    const newRequest = score(text, NEW_REQUEST_KEYWORDS);
    const extension = score(text, EXTENSION_KEYWORDS);
    const scores = { newRequest, extension };

    if (newRequest > extension) {
      return { label: 'new_request', confidence: confidenceFor(newRequest), scores };
    }
    if (extension > newRequest) {
      return { label: 'extension', confidence: confidenceFor(extension), scores };
    }
    return { label: 'unknown', confidence: UNKNOWN_CONFIDENCE, scores };
  }
}
