import type { EngineConfig } from '../utils/config';
import { Fingerprinter } from './duplicates/Fingerprinter';
import { FingerprintStore } from './duplicates/FingerprintStore';
import { ExtractionService } from './extraction/ExtractionService';
import { getTypeCoercionService } from './extraction/TypeCoercionService';
import { ValidationService } from './extraction/ValidationService';
import { TemplateMatcher } from './matching/TemplateMatcher';
import { DocumentProcessor } from './pipeline/DocumentProcessor';
import { TemplateLoader } from './templates/TemplateLoader';
import { TemplateRegistry } from './templates/TemplateRegistry';

export interface EngineServices {
  registry: TemplateRegistry;
  matcher: TemplateMatcher;
  processor: DocumentProcessor;
  fingerprintStore: FingerprintStore;
}

/**
 * Wires the engine for one configuration. The registry starts empty; call
 * `registry.reload()` before processing documents.
 */
export function createEngineServices(config: EngineConfig, loader?: TemplateLoader): EngineServices {
  const registry = new TemplateRegistry(loader ?? TemplateLoader.fromDirectory(config.templatesDir, config.userTemplatesDir));
  const matcher = new TemplateMatcher(config.matching);
  const extraction = new ExtractionService(getTypeCoercionService(), new ValidationService(config.validation));
  const fingerprinter = new Fingerprinter(config.fingerprint);

  return {
    registry,
    matcher,
    processor: new DocumentProcessor(registry, matcher, extraction, fingerprinter),
    fingerprintStore: new FingerprintStore(),
  };
}
