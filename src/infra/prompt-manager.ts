import fs from 'fs';
import path from 'path';
import Mustache from 'mustache';

export type PromptView = Record<string, unknown>;

/**
 * Renders the mustache templates under `src/prompts`. Templates use triple
 * braces, so values reach the oracle without HTML escaping.
 */
export class PromptManager {
  private static instance: PromptManager;
  private templates = new Map<string, string>();

  constructor(private promptDir: string = path.join(process.cwd(), 'src', 'prompts')) {}

  public static getInstance(): PromptManager {
    if (!PromptManager.instance) {
      PromptManager.instance = new PromptManager();
    }
    return PromptManager.instance;
  }

  public render(templateName: string, view: PromptView): string {
    return Mustache.render(this.load(templateName), view);
  }

  private load(templateName: string): string {
    const cached = this.templates.get(templateName);
    if (cached !== undefined) {
      return cached;
    }
    const filePath = path.join(this.promptDir, `${templateName}.mustache`);
    if (!fs.existsSync(filePath)) {
      throw new Error(`Prompt template not found: ${filePath}`);
    }
    const template = fs.readFileSync(filePath, 'utf-8');
    this.templates.set(templateName, template);
    return template;
  }
}
