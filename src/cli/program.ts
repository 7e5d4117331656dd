import { Command, InvalidArgumentError } from 'commander'
import { setLogLevel } from '../shared/logger'
import { createGitAdapter } from '../node/adapters/git'
import { RepoInspector } from '../node/operations/RepoInspector'
import { StatusReportOperation } from '../node/operations/StatusReportOperation'

export type CliOptions = {
  verbose?: boolean
  color: boolean
  nameOnly?: boolean
  maxCommitWidth?: number
  timeout?: number
}

export type ProgramDeps = {
  run?: typeof StatusReportOperation.run
  /** Whether stdout is a terminal; colours are only emitted when it is */
  isTTY?: boolean
}

function parsePositiveInt(value: string): number {
  const parsed = Number(value)
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Expected a positive integer.')
  }
  return parsed
}

export function createProgram(deps: ProgramDeps = {}): Command {
  const run = deps.run ?? StatusReportOperation.run.bind(StatusReportOperation)
  const isTTY = deps.isTTY ?? process.stdout.isTTY === true

  return new Command()
    .name('repo-pulse')
    .description('Report branch, last commit and sync state for a list of local Git repositories')
    .argument('<config>', 'JSON file with a "directories" list')
    .option('--verbose', 'Log every git query to stderr')
    .option('--no-color', 'Disable coloured output')
    .option('--name-only', 'Show repository names instead of full paths')
    .option('--max-commit-width <n>', 'Truncate the Last Commit column', parsePositiveInt)
    .option('--timeout <ms>', 'Kill a git invocation that stalls this long', parsePositiveInt)
    .allowExcessArguments(false)
    .showHelpAfterError()
    .action(async (configPath: string, options: CliOptions) => {
      if (options.verbose) {
        setLogLevel('debug')
      }

      const git = createGitAdapter({ timeoutMs: options.timeout, verbose: options.verbose })
      await run(configPath, {
        inspector: new RepoInspector(git),
        color: options.color && isTTY,
        nameOnly: options.nameOnly,
        maxCommitWidth: options.maxCommitWidth
      })
    })
}
