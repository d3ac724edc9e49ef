import { TerminalRenderer } from '../../renderer/TerminalRenderer';
import { ProviderRegistry } from '../services/ai/ProviderRegistry';
import { ProviderError } from '../services/ai/errors';
import type { CliContext } from './context';

/**
 * Markdown listing of every model each configured provider offers.
 * A provider that fails to answer gets a line saying so; the others are
 * still listed.
 */
export async function buildModelList(registry: ProviderRegistry): Promise<string> {
  let markdown = '# Available Models';

  for (const status of registry.available()) {
    markdown += `\n\n## ${status.label}`;

    if (!status.hasCredential) {
      markdown += `\n\nAPI key environment variable (${status.envVar}) not set.`;
      continue;
    }

    let models: string[];
    try {
      models = await registry.resolve(status.name).listModels();
    } catch (error) {
      if (!(error instanceof ProviderError)) throw error;
      markdown += `\n\nCould not list models (${error.kind}): ${error.message}`;
      continue;
    }

    if (models.length === 0) {
      markdown += '\n\nNo models available.';
      continue;
    }
    markdown += '\n\n' + models.map((model) => `* ${status.name}:${model}`).join('\n');
  }

  return markdown;
}

export async function runList(plain: boolean, ctx: CliContext): Promise<number> {
  const settings = await ctx.settings.getSettings();
  const registry = await ProviderRegistry.create(settings, ctx.credentials, ctx.env, ctx.factories);
  const renderer = new TerminalRenderer(ctx.stdout, { plain: plain || settings.plain });
  renderer.renderMarkdown(await buildModelList(registry));
  return 0;
}
