export interface TemplateRenderer {
  render(template: string, variables: Record<string, unknown>): Promise<string>;
}
