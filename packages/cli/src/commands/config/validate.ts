/**
 * filefollow config validate command
 */

import { loadForCommand } from '../../core/load.js';
import { OutputFormatter, prettyOutput } from '../../core/output.js';
import type { ConfigCommandOptions } from '../../core/types.js';
import { getVersion } from '../../cli.js';

export async function validateCommand(options: ConfigCommandOptions): Promise<void> {
  const output = new OutputFormatter(
    options.json ?? false,
    'config validate',
    getVersion(),
    options.verbose ?? false
  );

  try {
    const { config, configPath, warnings } = loadForCommand(options);
    output.setConfigPath(configPath);

    if (options.json) {
      output.success({
        config_path: configPath,
        valid: true,
        followers: Object.keys(config.followers()).length,
        targets: config.targets().length,
        warnings,
      });
    } else {
      prettyOutput.success('Configuration is valid');
      prettyOutput.blank();
      prettyOutput.keyValue('Config path', configPath);
      prettyOutput.keyValue('Followers', String(Object.keys(config.followers()).length));
      prettyOutput.keyValue('Targets', String(config.targets().length));
      for (const warning of warnings) {
        prettyOutput.warn(warning);
      }
    }
  } catch (error) {
    output.error(error);
  }
}
