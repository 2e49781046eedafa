import chalk from 'chalk'
import { loadConfig } from './config'
import { createProgram } from './program'

async function start() {
  try {
    const program = createProgram(
      {
        config: loadConfig(),
        colors: chalk,
        write: (line) => console.log(line),
        prompt: (text) => process.stdout.write(text),
        input: process.stdin,
      },
      (code) => { process.exitCode = code },
    )
    await program.parseAsync(process.argv)
  } catch (e) {
    console.error(chalk.red(e instanceof Error ? e.message : String(e)))
    process.exitCode = 1
  }
}

void start()
