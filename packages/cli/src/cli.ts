#!/usr/bin/env -S node --import tsx

import { HelpCommand, Kernel, ListLoader } from '@adonisjs/ace'
import AnalyzeCommand from './commands/analyze.ts'

const version = '0.1.0'

const kernel = Kernel.create()

kernel.info.set('binary', 'toylex')
kernel.info.set('version', version)

kernel.defineFlag('help', {
	alias: 'h',
	description: 'Display help information',
	type: 'boolean',
})

kernel.defineFlag('version', {
	alias: 'v',
	description: 'Display version number',
	type: 'boolean',
})

kernel.addLoader(new ListLoader([AnalyzeCommand, HelpCommand]))

kernel.on('finding:command', async (): Promise<boolean> => {
	console.log(`toylex v${version}`)
	console.log('')
	console.log('Usage: toylex <command> [options]')
	console.log('')
	console.log('Commands:')
	console.log('  analyze    Print the symbol table and PIF of source files')
	console.log('')
	console.log('Run "toylex --help" for available commands and options.')
	return true
})

try {
	await kernel.handle(process.argv.slice(2))
} catch (error: unknown) {
	console.error(error)
	process.exit(1)
}
