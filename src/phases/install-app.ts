import path from 'path'

import type { InstallPhase } from '../core/runner.js'

export const installAppPhase: InstallPhase = {
  name: 'install-app',
  title: 'Application Installation',
  description: 'Replace the application directory with the prepared bundle (may require sudo).',
  async run({ config, mutator, logger }) {
    const contents = path.join(config.installDir, 'Contents')
    logger.info('The following will be created:')
    for (const sub of ['MacOS', 'Resources', 'Frameworks']) logger.info(`  ${path.join(contents, sub)}`)

    await mutator.mutateDirectory(config.installDir, async (dir, exec) => {
      await exec.remove(dir)
      for (const sub of ['MacOS', 'Resources', 'Frameworks']) {
        await exec.mkdirp(path.join(dir, 'Contents', sub))
      }
      await exec.copy(config.bundleDir, path.join(dir, 'Contents', 'Resources', 'app'))
    }, 'install application')
    mutator.declareBuilt([
      contents,
      ...['MacOS', 'Resources', 'Frameworks'].map(sub => path.join(contents, sub)),
      path.join(contents, 'Resources', 'app'),
    ])
  },
}
