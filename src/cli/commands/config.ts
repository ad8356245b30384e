/**
 * Config CLI Commands
 *
 * Show and edit ~/.config/dossier/config.json.
 */

import type { Command } from 'commander';

import { c } from '../colors.js';
import { exitWithError } from '../helpers.js';

export function registerConfigCommand(program: Command): void {
  const configCmd = program
    .command('config')
    .description('Show or change Dossier settings');

  // `dossier config show`
  configCmd
    .command('show', { isDefault: true })
    .description('Show the resolved configuration (environment overrides applied)')
    .action(async () => {
      const { loadDossierConfig, getDossierConfigPath, maskSecret } = await import('../../core/config.js');

      try {
        const config = await loadDossierConfig();
        const customTemplates = Object.keys(config.templates);

        console.log(`\n${c.title('Dossier Config')}`);
        console.log(c.dim(getDossierConfigPath()) + '\n');
        console.log(`  provider              ${config.provider}`);
        console.log(`  openai_api_key        ${maskSecret(config.openaiApiKey)}`);
        console.log(`  openai_base_url       ${config.openaiBaseUrl || '(default)'}`);
        console.log(`  anthropic_api_key     ${maskSecret(config.anthropicApiKey)}`);
        console.log(`  briefing_model        ${config.briefingModel}`);
        console.log(`  editor_model          ${config.editorModel}`);
        console.log(`  briefing_concurrency  ${config.briefingConcurrency}`);
        console.log(`  max_doc_length        ${config.maxDocLength}`);
        console.log(`  max_prompt_length     ${config.maxPromptLength}`);
        console.log(`  request_timeout_ms    ${config.requestTimeoutMs}`);
        console.log(`  templates             ${customTemplates.length > 0 ? customTemplates.join(', ') : '(built-in)'}`);
        console.log('');
      } catch (error) {
        exitWithError(error instanceof Error ? error.message : String(error));
      }
    });

  // `dossier config set <key> <value>`
  configCmd
    .command('set')
    .description('Set a value in config.json')
    .argument('<key>', 'Setting name, e.g. provider, briefing_model, briefing_concurrency')
    .argument('<value>', 'New value')
    .action(async (key: string, value: string) => {
      const { saveDossierConfig, getDossierConfigPath, isSettableKey, parseSettingValue, SETTABLE_KEYS } = await import(
        '../../core/config.js'
      );

      if (!isSettableKey(key)) {
        exitWithError(`Unknown setting "${key}". Settable: ${Object.keys(SETTABLE_KEYS).join(', ')}`);
      }

      try {
        await saveDossierConfig({ [key]: parseSettingValue(key, value) });
        console.log(c.success(`Saved ${key} to ${getDossierConfigPath()}`));
      } catch (error) {
        exitWithError(error instanceof Error ? error.message : String(error));
      }
    });
}
