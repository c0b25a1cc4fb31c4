import { Command } from 'commander'
import { Config } from '../config.js'
import { CollectionError } from '../collection/errors.js'
import { LogLevelEnum, Logger } from '../collection/log.js'
import { CollectionPersistence } from '../persistence/collectionPersistence.js'
import { CollectionCommands, IaddFieldOptions } from './commands.js'

const log = new Logger('listicles')
export const programVersion = '0.1.0'

interface IglobalOptions {
  dataDir?: string
  config?: string
  verbose?: boolean
}

export type Output = (line: string) => void

export function createProgram(output: Output = (line) => console.log(line)): Command {
  const cli = new Command()
  cli.name('listicles')
  cli.version(programVersion)
  cli.description('Keeps custom collections as Markdown files')
  cli.option('-d, --data-dir <data-dir>', 'set directory for collection files')
  cli.option('-c, --config <config-file>', 'set configuration file')
  cli.option('-v, --verbose', 'verbose logging')

  const run = (action: (commands: CollectionCommands) => string[]): void => {
    try {
      const opts = cli.opts<IglobalOptions>()
      const config = Config.resolve({
        dataDir: opts.dataDir,
        config: opts.config,
        logLevel: opts.verbose ? LogLevelEnum.verbose : undefined,
      })
      Logger.setLevel(config.logLevel)
      const commands = new CollectionCommands(new CollectionPersistence(config.dataDir))
      action(commands).forEach((line) => output(line))
    } catch (e: unknown) {
      if (!(e instanceof CollectionError)) throw e
      log.log(LogLevelEnum.error, e.message)
      process.exitCode = 1
    }
  }

  cli
    .command('list')
    .description('list all collections')
    .action(() => run((c) => c.list()))
  cli
    .command('show <collection>')
    .description('print the items of a collection')
    .action((name: string) => run((c) => c.show(name)))
  cli
    .command('create <collection>')
    .description('create an empty collection')
    .requiredOption('-t, --type <type>', 'category label, e.g. books')
    .action((name: string, opts: { type: string }) => run((c) => c.create(name, opts.type)))
  cli
    .command('add-field <collection> <field>')
    .description('add a field definition')
    .requiredOption('-t, --type <type>', 'text, number, date, boolean or select')
    .option('-r, --required', 'items must have a value')
    .option('-o, --options <options>', 'comma separated options of a select field')
    .action((name: string, field: string, opts: IaddFieldOptions) => run((c) => c.addField(name, field, opts)))
  cli
    .command('remove-field <collection> <field>')
    .description('remove a field and its values')
    .action((name: string, field: string) => run((c) => c.removeField(name, field)))
  cli
    .command('rename-field <collection> <from> <to>')
    .description('rename a field')
    .action((name: string, from: string, to: string) => run((c) => c.renameField(name, from, to)))
  cli
    .command('add <collection> [values...]')
    .description('add an item, values as field=value')
    .action((name: string, values: string[]) => run((c) => c.add(name, values)))
  cli
    .command('update <collection> <id> [values...]')
    .description('change item values, an empty value clears a field')
    .action((name: string, id: string, values: string[]) => run((c) => c.update(name, id, values)))
  cli
    .command('remove <collection> <id>')
    .description('remove an item')
    .action((name: string, id: string) => run((c) => c.remove(name, id)))
  cli
    .command('delete <collection>')
    .description('delete a collection file')
    .action((name: string) => run((c) => c.delete(name)))
  return cli
}
