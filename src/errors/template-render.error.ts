export class TemplateRenderError extends Error {
  constructor(detail: string) {
    super(`Template rendering failed: ${detail}`);
    this.name = 'TemplateRenderError';
  }
}
