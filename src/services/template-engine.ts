import { Liquid } from 'liquidjs';
import type { TemplateBindings, TemplateEngine } from '../types/host.js';
import { logThought } from '../utils/logger.js';

export interface LiquidTemplateEngineOptions {
  /** Fail on undefined variables instead of rendering them empty. */
  strictVariables?: boolean;
}

/** Default `TemplateEngine`: Liquid syntax (`{{ topic }}`, `{{ _Parameter.Value }}`, `{% for %}`). */
export class LiquidTemplateEngine implements TemplateEngine {
  readonly #liquid: Liquid;

  constructor(options: LiquidTemplateEngineOptions = {}) {
    this.#liquid = new Liquid({
      strictVariables: options.strictVariables ?? false,
      cache: true,
    });
  }

  render(template: string, bindings: TemplateBindings): string {
    if (!template.trim()) {
      return '';
    }

    try {
      return String(this.#liquid.parseAndRenderSync(template, bindings));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      void logThought(`[TemplateEngine] Rendering failed, using raw template: ${message}`);
      return template;
    }
  }
}
