/**
 * Template Renderer - (Template, GenerationConfig) -> artifact content.
 *
 * Pure: no clock, no randomness, no I/O, so identical inputs always give
 * byte-identical output.
 */
import { parseTemplate, type TemplateNode } from './parser.js';
import { evaluateCondition } from './condition.js';
import { applyFilter } from './escape.js';
import type { GenerationConfig, Template } from '../store/types.js';
import { RenderError, ErrorCodes } from '../../utils/errors.js';

/**
 * Render a template from the store.
 */
export function renderTemplate(template: Template, config: GenerationConfig): string {
  return renderSource(template.content, config, template.path);
}

/**
 * Render a template given as a string, e.g. an output file name or an
 * integration step.
 */
export function renderSource(source: string, config: GenerationConfig, templateName = 'inline'): string {
  const nodes = parseTemplate(source, templateName);
  return renderNodes(nodes, config, templateName);
}

function renderNodes(nodes: readonly TemplateNode[], config: GenerationConfig, templateName: string): string {
  let out = '';

  for (const node of nodes) {
    switch (node.type) {
      case 'text':
        out += node.value;
        break;

      case 'placeholder': {
        if (!Object.prototype.hasOwnProperty.call(config, node.name)) {
          throw new RenderError(
            ErrorCodes.UNKNOWN_PLACEHOLDER,
            `Placeholder '${node.name}' at ${templateName}:${node.line} is not in the configuration`,
            { template: templateName, line: node.line, option: node.name }
          );
        }
        out += applyFilter(node.filter, config[node.name], {
          option: node.name,
          template: templateName,
          line: node.line,
        });
        break;
      }

      case 'block': {
        let holds: boolean;
        try {
          holds = evaluateCondition(node.condition, config);
        } catch (error) {
          if (error instanceof RenderError) {
            throw new RenderError(error.code, `${error.message} (${templateName}:${node.line})`, {
              ...error.details,
              template: templateName,
              line: node.line,
            });
          }
          throw error;
        }
        const branch = holds !== node.negate ? node.body : node.alternate;
        out += renderNodes(branch, config, templateName);
        break;
      }
    }
  }

  return out;
}
