import type { ParamSpec } from '../types/delegation.js';
import type { JsonSchema, JsonSchemaProperty } from '../types/host.js';

function toSchemaProperty(param: ParamSpec): JsonSchemaProperty {
  const property: JsonSchemaProperty = { type: param.type };
  if (param.description.trim()) {
    property.description = param.description;
  }

  switch (param.type) {
    case 'datetime':
      property.type = 'string';
      property.format = 'date-time';
      break;
    case 'array':
      if (param.items) {
        property.items = toSchemaProperty(param.items);
      }
      break;
    case 'object':
      if (param.properties && param.properties.length > 0) {
        const nested = toJsonSchema(param.properties);
        property.properties = nested.properties;
        property.required = nested.required;
      }
      break;
    default:
      break;
  }

  return property;
}

/** Builds the argument schema a model sees for a delegate or callback function. */
export function toJsonSchema(params: readonly ParamSpec[]): JsonSchema {
  const properties: Record<string, JsonSchemaProperty> = {};
  const required: string[] = [];

  for (const param of params) {
    properties[param.name] = toSchemaProperty(param);
    if (param.required) {
      required.push(param.name);
    }
  }

  return { type: 'object', properties, required };
}
