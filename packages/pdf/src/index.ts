/**
 * PDF Package - Main Export
 *
 * PDF backends plus the factory that wires a DocumentValidator from
 * configuration.
 */

import {
  DocumentTypeClassifier,
  DocumentValidator,
  FieldExtractor,
  SignatureDetector,
  TextExtractor,
  ValidationRuleEngine,
  config as defaultConfig,
  createJudge,
  createTelemetrySink,
  getValidationSettings,
  type Config,
  type Judge,
  type TelemetrySink,
} from '@vpncheck/shared';
import { PdfParseTextBackend } from './fallback-backend';
import { PdfjsTextBackend } from './primary-backend';
import { PdfjsRasterizer } from './rasterizer';

export { PdfjsTextBackend } from './primary-backend';
export { PdfParseTextBackend, renderPlainText } from './fallback-backend';
export { PdfjsRasterizer } from './rasterizer';
export { layoutPage, groupLines, splitCells, detectTables, type PositionedText, type PageLayout } from './layout';

export interface ValidatorOverrides {
  judge?: Judge;
  telemetry?: TelemetrySink;
}

export function createDocumentValidator(
  cfg: Readonly<Config> = defaultConfig,
  overrides: ValidatorOverrides = {}
): DocumentValidator {
  const settings = getValidationSettings(cfg);

  return new DocumentValidator({
    textExtractor: new TextExtractor(new PdfjsTextBackend(), new PdfParseTextBackend()),
    classifier: new DocumentTypeClassifier(),
    fieldExtractor: new FieldExtractor(settings.requiredFields),
    signatureDetector: new SignatureDetector(new PdfjsRasterizer(), settings),
    ruleEngine: new ValidationRuleEngine(settings),
    judge: overrides.judge ?? createJudge(cfg),
    telemetry: overrides.telemetry ?? createTelemetrySink(cfg),
    settings,
    judgePolicy: { timeoutMs: cfg.judgeTimeoutMs, maxRetries: cfg.judgeMaxRetries },
    appName: cfg.appName,
    agentVersion: cfg.agentVersion,
  });
}
