import chalk from 'chalk'
import type {Command} from 'commander'
import {createPackageRegistry, packageIds} from '../../recipes/packages.js'
import {recipeStepId} from '../../recipes/types.js'
import {getGlobalOptions} from '../utils.js'

export function registerPackagesCommand(program: Command): void {
  program
    .command('packages')
    .description('List the target-root packages in build order')
    .action((_options: Record<string, unknown>, cmd: Command) => {
      const {json} = getGlobalOptions(cmd)
      const registry = createPackageRegistry()
      const rows = packageIds.map(name => {
        const dispatch = registry.dispatch(name)
        return {name, step: dispatch.kind === 'recipe' ? recipeStepId(dispatch.recipe) : undefined}
      })

      if (json) {
        console.log(JSON.stringify(rows, null, 2))
        return
      }

      const nameWidth = Math.max('PACKAGE'.length, ...rows.map(r => r.name.length))
      console.log(chalk.bold(`${'PACKAGE'.padEnd(nameWidth)}  STEP`))
      for (const row of rows) {
        const step = row.step ?? chalk.yellow('unsupported')
        console.log(`${row.name.padEnd(nameWidth)}  ${step}`)
      }
    })
}
