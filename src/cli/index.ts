#!/usr/bin/env node
/**
 * pawpoints CLI
 *
 * Usage:
 *   pawpoints
 *   pawpoints --lat 25.0330 --lon 121.5654 --radius 1500 --top 10
 */

import { createInterface } from 'node:readline/promises'
import { Command } from 'commander'
import chalk from 'chalk'
import { nearbyService } from '../services/nearby.service.js'
import { runDemo, type DemoFlags } from './demo.js'
import { isEntryPoint } from './entry.js'

export function createProgram(): Command {
  const program = new Command()

  program
    .name('pawpoints')
    .description('Find veterinary clinics and pet-friendly restaurants near a coordinate (OpenStreetMap)')
    .option('--lat <number>', 'origin latitude')
    .option('--lon <number>', 'origin longitude')
    .option('--radius <meters>', 'search radius in meters (default 1500)')
    .option('--top <n>', 'number of results per search (default 10)')
    .option('--lenient', 'include every restaurant/cafe, not only those tagged pet friendly')
    .action(async () => {
      const flags = program.opts<DemoFlags>()
      const rl = createInterface({ input: process.stdin, output: process.stdout })

      try {
        await runDemo(flags, {
          service: nearbyService,
          prompt: (question) => rl.question(question),
          print: (text) => console.log(text),
        })
      } finally {
        rl.close()
      }
    })

  return program
}

export async function main(): Promise<void> {
  try {
    await createProgram().parseAsync(process.argv)
  } catch (error) {
    console.error(chalk.red(`Error: ${error instanceof Error ? error.message : String(error)}`))
    process.exit(1)
  }
}

// Run if executed directly
if (isEntryPoint(process.argv[1], import.meta.url)) {
  void main()
}
