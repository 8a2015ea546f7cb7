import { Liquid } from 'liquidjs';
import { TemplateRenderError } from '../errors/template-render.error';
import type { TemplateRenderer } from '../interfaces/template-renderer.interface';
import { errorMessage } from '../utils/error-utils';

const PARTIAL_EXTENSIONS = ['.md.liquid', '.liquid', '.markdown', '.md'];

/**
 * Registers each partial under its own name and under the name without a
 * known template extension, so `{% render "principals" %}` finds
 * `principals.md.liquid`.
 */
function indexPartials(partials: Record<string, string>): Record<string, string> {
  const templates: Record<string, string> = {};
  for (const [name, source] of Object.entries(partials)) {
    templates[name] = source;
    const extension = PARTIAL_EXTENSIONS.find((ext) => name.endsWith(ext));
    if (extension) {
      const bare = name.slice(0, -extension.length);
      templates[bare] ??= source;
    }
  }
  return templates;
}

export class LiquidTemplateRenderer implements TemplateRenderer {
  private readonly engine: Liquid;

  constructor(partials: Record<string, string> = {}) {
    this.engine = new Liquid({ templates: indexPartials(partials) });

    // Marks a file as a partial; renders nothing.
    this.engine.registerTag('partial', {
      parse() {},
      render() {
        return '';
      },
    });
  }

  async render(
    template: string,
    variables: Record<string, unknown>,
  ): Promise<string> {
    try {
      return await this.engine.parseAndRender(template, variables);
    } catch (error) {
      throw new TemplateRenderError(errorMessage(error));
    }
  }
}
