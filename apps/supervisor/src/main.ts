import { runCli } from './cli'
import { logger } from './logger'

runCli(process.argv.slice(2)).then(
  (code) => {
    process.exit(code)
  },
  (err: unknown) => {
    logger.fatal({ err }, 'cli_crashed')
    process.exit(1)
  },
)
