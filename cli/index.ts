import cac from 'cac'

import type { ReleaseCommandOptions } from './run-release'

import { version } from '../package.json'
import { runRelease } from './run-release'

/** Run the CLI. */
export function run(): void {
  let cli = cac('tagship')

  cli
    .help()
    .version(version)
    .option('--config <path>', 'Release config file (default: tagship.yml)')
    .option('--repo <owner/repo>', 'Repository to publish to')
    .option('--platform <name>', 'Only build these platforms (repeatable)')
    .option('--dry-run', 'Show the build plan without running it')
    .option('--yes, -y', 'Skip the confirmation prompt')
    .command('[tag]', 'Build and publish a release for a tag')
    .action(async (tag: undefined | string, options: ReleaseCommandOptions) => {
      let code = await runRelease(tag, options)
      if (code !== 0) {
        process.exit(code)
      }
    })

  cli.parse()
}
