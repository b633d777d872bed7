/**
 * filefollow config show command
 */

import { loadForCommand } from '../../core/load.js';
import { OutputFormatter, prettyOutput } from '../../core/output.js';
import { summarizeConfig } from '../../core/summary.js';
import type { ConfigCommandOptions } from '../../core/types.js';
import { getVersion } from '../../cli.js';

export async function showCommand(options: ConfigCommandOptions): Promise<void> {
  const output = new OutputFormatter(
    options.json ?? false,
    'config show',
    getVersion(),
    options.verbose ?? false
  );

  try {
    const { config, configPath, warnings } = loadForCommand(options);
    output.setConfigPath(configPath);
    const summary = summarizeConfig(config, configPath, warnings);

    if (options.json) {
      output.success(summary);
      return;
    }

    prettyOutput.header('Global');
    prettyOutput.keyValue('Config path', summary.config_path);
    prettyOutput.keyValue('Ingest secret', summary.secret);
    prettyOutput.keyValue('Connection timeout', summary.timeout);
    prettyOutput.keyValue('Verify remote certificates', String(summary.verify_remote));
    prettyOutput.keyValue('Log level', summary.log_level);
    prettyOutput.keyValue('State store', summary.state_path || '(unset)');
    prettyOutput.keyValue('Ingest cache', summary.cache.enabled ? summary.cache.path : 'disabled');

    prettyOutput.header('Targets');
    prettyOutput.list(summary.targets);

    prettyOutput.header('Tags');
    prettyOutput.list(summary.tags);

    prettyOutput.header('Followers');
    for (const [name, follower] of Object.entries(summary.followers)) {
      prettyOutput.keyValue(name, `${follower.Base_Directory} (${follower.File_Filter || '*'}) -> ${follower.Tag_Name}`);
    }

    if (warnings.length > 0) {
      prettyOutput.blank();
      for (const warning of warnings) {
        prettyOutput.warn(warning);
      }
    }
  } catch (error) {
    output.error(error);
  }
}
