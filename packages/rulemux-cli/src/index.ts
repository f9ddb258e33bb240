#!/usr/bin/env tsx
/**
 * rulemux -- Translate AI coding-assistant rules between dialects.
 *
 * Supports Cursor, Windsurf, GitHub Copilot, Claude Code, Gemini CLI and
 * Google Antigravity, with a git-backed store for sharing rules across machines.
 *
 * Usage:
 *   rulemux convert            Convert rules from one dialect to another
 *   rulemux push               Store a dialect's rules under a project
 *   rulemux pull               Write a project's stored rules in a dialect
 *   rulemux sync               Reconcile the store with its git remote
 *   rulemux init               Initialize the rule store
 *   rulemux project            List or rename project groups
 *   rulemux formats            List supported dialects
 *   rulemux discover           Show user-level rule locations
 *   rulemux scan               Scan a directory for rules in every dialect
 *   rulemux restore            Restore files from a pre-write backup
 */
import { defineCommand, runMain } from "citty"
import { RULEMUX_VERSION } from "rulemux"
import convertCommand from "./commands/convert"
import discoverCommand from "./commands/discover"
import formatsCommand from "./commands/formats"
import initCommand from "./commands/init"
import projectCommand from "./commands/project"
import pullCommand from "./commands/pull"
import pushCommand from "./commands/push"
import restoreCommand from "./commands/restore"
import scanCommand from "./commands/scan"
import syncCommand from "./commands/sync"

const main = defineCommand({
	meta: {
		name: "rulemux",
		version: RULEMUX_VERSION,
		description: "Translate AI coding-assistant rules between dialects",
	},
	subCommands: {
		convert: convertCommand,
		push: pushCommand,
		pull: pullCommand,
		sync: syncCommand,
		init: initCommand,
		project: projectCommand,
		formats: formatsCommand,
		discover: discoverCommand,
		scan: scanCommand,
		restore: restoreCommand,
	},
})

runMain(main)
