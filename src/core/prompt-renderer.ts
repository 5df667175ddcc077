import type { DelegationConfig, WorkItem } from '../types/delegation.js';
import { ConfigurationError } from '../types/delegation-errors.js';
import { isSessionHandle, type TemplateBindings, type TemplateEngine } from '../types/host.js';
import type { ArgumentRecord } from './parameter-validator.js';

const WORK_ITEM_BINDING = '_Parameter';
const CONFIG_BINDING = '_Config';

export interface RenderedPrompts {
  prompt: string;
  urging: string;
}

function isHostPlumbing(value: unknown): boolean {
  return isSessionHandle(value) || value instanceof AbortSignal;
}

/**
 * Bindings visible to prompt templates, in precedence order: declared inputs
 * (missing required ones bound to `null`), other request entries, `_Config`, and
 * `_Parameter` (`{ Name, Value }` of the current work item, nulls in single mode).
 */
export function buildTemplateBindings(
  config: DelegationConfig,
  args: ArgumentRecord,
  workItem?: WorkItem,
): TemplateBindings {
  const bindings: TemplateBindings = {};

  for (const param of config.inputParameters) {
    if (Object.prototype.hasOwnProperty.call(args, param.name)) {
      bindings[param.name] = args[param.name];
    } else if (param.required) {
      bindings[param.name] = null;
    }
  }

  for (const [key, value] of Object.entries(args)) {
    if (key in bindings || key.startsWith(WORK_ITEM_BINDING) || isHostPlumbing(value)) {
      continue;
    }
    bindings[key] = value;
  }

  bindings[CONFIG_BINDING] = { ...config };
  bindings[WORK_ITEM_BINDING] = {
    Name: workItem?.name ?? null,
    Value: workItem?.value ?? null,
  };

  return bindings;
}

export function renderPrompts(
  engine: TemplateEngine,
  config: DelegationConfig,
  args: ArgumentRecord,
  workItem?: WorkItem,
): RenderedPrompts {
  const bindings = buildTemplateBindings(config, args, workItem);
  const prompt = engine.render(config.promptMessage, bindings);
  const urging = config.urgingMessage.trim() ? engine.render(config.urgingMessage, bindings) : '';

  if (config.danglingBehavior === 'urge' && !urging.trim()) {
    throw new ConfigurationError('UrgingMessage cannot be empty.');
  }

  return { prompt, urging };
}
