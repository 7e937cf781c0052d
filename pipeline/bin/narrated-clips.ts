#!/usr/bin/env node
import * as dotenv from 'dotenv'
import { hideBin } from 'yargs/helpers'
import { runNarrate } from '../cli/narrate'

dotenv.config()

runNarrate(hideBin(process.argv))
  .then((code) => {
    process.exitCode = code
  })
  .catch((err) => {
    console.error(err)
    process.exit(1)
  })
