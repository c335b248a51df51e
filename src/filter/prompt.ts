/**
 * Promotion detection prompt and response parsing
 */

import type { ClassificationResult } from '../types/index.js';

export const BOOLEAN_PREFIX = 'Booleano:';
export const SUMMARY_PREFIX = 'Sumário:';
export const NOT_APPLICABLE = 'N/A';

export function buildPromotionPrompt(text: string, promoDescription: string): string {
  return `Analise o seguinte conteúdo de texto e identifique se ele contém informações sobre: ${promoDescription}.
Por favor, retorne TRUE se houver tal promoção e FALSE caso contrário.
Se a promoção for encontrada, forneça também um breve sumário dos principais detalhes da promoção (por exemplo, período da promoção, bônus percentual, condições).

Conteúdo do texto:
---
${text}
---

Formato da resposta esperado:
${BOOLEAN_PREFIX} [TRUE/FALSE]
${SUMMARY_PREFIX} [Sumário da promoção, se TRUE. Caso contrário, '${NOT_APPLICABLE}']`;
}

/**
 * Read the two recognized lines out of a model answer; other lines are ignored
 */
export function parseClassifierResponse(raw: string): ClassificationResult {
  let isRelevant = false;
  let summary = NOT_APPLICABLE;

  for (const line of raw.split(/\r?\n/)) {
    const trimmed = line.trim();

    if (trimmed.startsWith(BOOLEAN_PREFIX)) {
      isRelevant = trimmed.slice(BOOLEAN_PREFIX.length).trim().toUpperCase() === 'TRUE';
    } else if (trimmed.startsWith(SUMMARY_PREFIX)) {
      summary = trimmed.slice(SUMMARY_PREFIX.length).trim();
    }
  }

  return { isRelevant, summary };
}
