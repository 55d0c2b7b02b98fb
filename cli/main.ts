import { runCli } from '../src/cli'

process.exitCode = runCli(process.env)
