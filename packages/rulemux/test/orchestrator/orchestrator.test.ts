/**
 * Tests for convert, push, pull and batch reads.
 */
import { rm } from "node:fs/promises"
import { join } from "node:path"
import { describe, expect, test } from "vitest"
import { MalformedMetadataError, UnknownFormatError, UnreadableSourceError } from "../../src/errors"
import { convertRules, pullRules, pushRules, readSources, scanAll } from "../../src/orchestrator"
import type { Store } from "../../src/store"
import { initStore } from "../../src/store"
import { silentLogger } from "../../src/utils/logger"
import { MemoryVcs } from "../helpers/memory-vcs"
import { readText, testClock, useTmpDirs, writeFiles } from "../helpers/tmp"

const tmpDir = useTmpDirs("orchestrator")

const CURSOR_FILES = {
	".cursor/rules/typescript.mdc": '---\nglobs:\n  - "*.ts"\nalwaysApply: false\n---\n\nUse strict mode.\n',
	".cursor/rules/tabs.mdc": "---\nalwaysApply: true\n---\n\nUse tabs.\n",
}

async function newStore(): Promise<{ store: Store; vcs: MemoryVcs }> {
	const root = tmpDir()
	const vcs = new MemoryVcs(root)
	const store = await initStore({
		root,
		vcs,
		clock: testClock("2026-06-01T12:00:00.000Z").now,
		logger: silentLogger,
	})
	return { store, vcs }
}

// ─── convert ─────────────────────────────────────────────────────────

describe("convertRules", () => {
	test("dry run reports the plan and writes nothing", async () => {
		const input = tmpDir()
		const output = tmpDir()
		await writeFiles(input, CURSOR_FILES)

		const result = await convertRules({ from: "cursor", to: "claude", input, output, dryRun: true })

		expect(result.rules.map((r) => r.name)).toEqual(["tabs", "typescript"])
		expect(result.write.dryRun).toBe(true)
		expect(result.write.changes).toEqual([{ path: join(output, "CLAUDE.md"), status: "create" }])
		await expect(readText(output, "CLAUDE.md")).rejects.toThrow()
	})

	test("writes the target dialect", async () => {
		const input = tmpDir()
		const output = tmpDir()
		await writeFiles(input, CURSOR_FILES)

		await convertRules({ from: "cursor", to: "claude-code", input, output })

		expect(await readText(output, "CLAUDE.md")).toBe(
			[
				"## tabs",
				'<!-- rulemux {"name":"tabs","scope":"project","activation":"always"} -->',
				"",
				"Use tabs.",
				"",
				"## typescript",
				'<!-- rulemux {"name":"typescript","scope":"project","activation":"glob","globs":["*.ts"]} -->',
				"",
				"Use strict mode.",
				"",
			].join("\n"),
		)
	})

	test("applies the scope filter", async () => {
		const input = tmpDir()
		await writeFiles(input, {
			"global_rules.md": "Be brief.\n",
			".windsurf/rules/tabs.md": "Use tabs.\n",
		})

		const result = await convertRules({
			from: "windsurf",
			to: "gemini",
			input,
			output: tmpDir(),
			scope: "user",
			dryRun: true,
		})

		expect(result.rules.map((r) => r.name)).toEqual(["global-rules"])
	})

	test("rejects unknown formats before reading", async () => {
		await expect(
			convertRules({ from: "vim", to: "claude", input: tmpDir(), output: tmpDir() }),
		).rejects.toBeInstanceOf(UnknownFormatError)
	})
})

// ─── push ────────────────────────────────────────────────────────────

describe("pushRules", () => {
	test("stores every rule under the project and commits", async () => {
		const input = tmpDir()
		await writeFiles(input, CURSOR_FILES)
		const { store, vcs } = await newStore()

		const result = await pushRules({ store, format: "cursor", input, project: "web", logger: silentLogger })

		expect(result.read).toBe(2)
		expect(result.created.map((r) => r.name)).toEqual(["tabs", "typescript"])
		expect(result.commit).toBe(vcs.localHead)
		expect(vcs.commits.get(result.commit ?? "")?.message).toBe("Push 2 rule(s) from cursor into web")
		expect((await store.getAll({ project: "web" })).map((r) => r.sourceFormat)).toEqual([
			"cursor",
			"cursor",
		])
	})

	test("a repeated push changes nothing", async () => {
		const input = tmpDir()
		await writeFiles(input, CURSOR_FILES)
		const { store } = await newStore()
		await pushRules({ store, format: "cursor", input, project: "web", logger: silentLogger })

		const again = await pushRules({ store, format: "cursor", input, project: "web", logger: silentLogger })

		expect(again.unchanged).toHaveLength(2)
		expect(again.created).toEqual([])
		expect(again.updated).toEqual([])
		expect(again.commit).toBeUndefined()
	})

	test("prunes only rules from the same dialect and project", async () => {
		const input = tmpDir()
		await writeFiles(input, CURSOR_FILES)
		const { store } = await newStore()
		await pushRules({ store, format: "cursor", input, project: "web", logger: silentLogger })
		await store.put({ scope: "project", activation: "always", name: "notes", content: "From Claude.", project: "web", sourceFormat: "claude" })
		await store.put({ scope: "project", activation: "always", name: "tabs", content: "Other project.", project: "api", sourceFormat: "cursor" })

		const cursorOnly = tmpDir()
		await writeFiles(cursorOnly, { ".cursor/rules/tabs.mdc": CURSOR_FILES[".cursor/rules/tabs.mdc"] })
		const result = await pushRules({
			store,
			format: "cursor",
			input: cursorOnly,
			project: "web",
			prune: true,
			logger: silentLogger,
		})

		expect(result.pruned.map((r) => r.name)).toEqual(["typescript"])
		expect((await store.getAll()).map((r) => `${r.project}/${r.name}`)).toEqual([
			"api/tabs",
			"web/notes",
			"web/tabs",
		])
	})

	test("without prune, rules missing from the source stay", async () => {
		const input = tmpDir()
		await writeFiles(input, CURSOR_FILES)
		const { store } = await newStore()
		await pushRules({ store, format: "cursor", input, project: "web", logger: silentLogger })

		const empty = tmpDir()
		await writeFiles(empty, { ".cursor/rules/.keep": "" })
		const result = await pushRules({ store, format: "cursor", input: empty, project: "web", logger: silentLogger })

		expect(result.read).toBe(0)
		expect(result.pruned).toEqual([])
		expect(await store.getAll()).toHaveLength(2)
	})

	test("keeps same-named rules of one read as separate records", async () => {
		const input = tmpDir()
		await writeFiles(input, {
			".claude/commands/review.md": "Check the diff.\n",
			".claude/skills/review/SKILL.md": "---\nname: review\ndescription: Reviews diffs\n---\n\nBe picky.\n",
		})
		const { store } = await newStore()

		const result = await pushRules({ store, format: "claude", input, project: "web", logger: silentLogger })

		expect(result.created.map((r) => r.name)).toEqual(["review", "review-2"])
		expect(result.updated).toEqual([])
		expect(result.warnings).toEqual([
			'review: another rule in "web" has this name; the ai_decides one is stored as "review-2"',
		])
		expect((await store.getAll()).map((r) => [r.name, r.activation, r.content])).toEqual([
			["review", "on_demand", "Check the diff."],
			["review-2", "ai_decides", "Be picky."],
		])

		const again = await pushRules({ store, format: "claude", input, project: "web", logger: silentLogger })
		expect(again.unchanged).toHaveLength(2)
		expect(again.commit).toBeUndefined()
	})

	test("prunes user rules removed from a user-level source", async () => {
		const home = tmpDir()
		const input = join(home, ".claude")
		await writeFiles(home, { ".claude/rules/a.md": "Rule A.\n", ".claude/rules/b.md": "Rule B.\n" })
		const { store } = await newStore()
		await pushRules({ store, format: "claude", input, project: "dotfiles", logger: silentLogger })

		await rm(join(input, "rules", "b.md"))
		const result = await pushRules({
			store,
			format: "claude",
			input,
			project: "dotfiles",
			prune: true,
			logger: silentLogger,
		})

		expect(result.pruned.map((r) => `${r.project}/${r.name}`)).toEqual(["user/b"])
		expect((await store.getAll()).map((r) => `${r.project}/${r.name}`)).toEqual(["user/a"])
	})

	test("a project read without user rules leaves the user group alone", async () => {
		const memories = tmpDir()
		await writeFiles(memories, { "global_rules.md": "Be brief.\n" })
		const repo = tmpDir()
		await writeFiles(repo, { ".windsurf/rules/tabs.md": "Use tabs.\n" })
		const { store } = await newStore()
		await pushRules({ store, format: "windsurf", input: memories, project: "web", logger: silentLogger })

		const result = await pushRules({
			store,
			format: "windsurf",
			input: repo,
			project: "web",
			prune: true,
			logger: silentLogger,
		})

		expect(result.pruned).toEqual([])
		expect((await store.getAll()).map((r) => `${r.project}/${r.name}`)).toEqual([
			"user/global-rules",
			"web/tabs",
		])
	})

	test("dry run reports the outcome without touching the store", async () => {
		const input = tmpDir()
		await writeFiles(input, CURSOR_FILES)
		const { store, vcs } = await newStore()
		const head = vcs.localHead

		const result = await pushRules({ store, format: "cursor", input, project: "web", dryRun: true, logger: silentLogger })

		expect(result.dryRun).toBe(true)
		expect(result.created).toHaveLength(2)
		expect(result.commit).toBeUndefined()
		expect(await store.getAll()).toEqual([])
		expect(vcs.localHead).toBe(head)
	})
})

// ─── pull ────────────────────────────────────────────────────────────

describe("pullRules", () => {
	test("writes the project's rules together with user rules", async () => {
		const { store } = await newStore()
		await store.put({ scope: "project", activation: "always", name: "tabs", content: "Use tabs.", project: "web" })
		await store.put({ scope: "project", activation: "always", name: "other", content: "Not this one.", project: "api" })
		await store.put({ scope: "user", activation: "always", name: "brief", content: "Be brief." })
		const output = tmpDir()

		const result = await pullRules({ store, format: "gemini", output, project: "web" })

		expect(result.rules.map((r) => r.name)).toEqual(["tabs", "brief"])
		expect(await readText(output, "GEMINI.md")).toBe(
			[
				"## tabs",
				'<!-- rulemux {"name":"tabs","scope":"project","activation":"always"} -->',
				"",
				"Use tabs.",
				"",
				"## brief",
				'<!-- rulemux {"name":"brief","scope":"user","activation":"always"} -->',
				"",
				"Be brief.",
				"",
			].join("\n"),
		)
	})

	test("honours the scope filter and dry run", async () => {
		const { store } = await newStore()
		await store.put({ scope: "project", activation: "always", name: "tabs", content: "Use tabs.", project: "web" })
		await store.put({ scope: "user", activation: "always", name: "brief", content: "Be brief." })
		const output = tmpDir()

		const result = await pullRules({ store, format: "cursor", output, project: "web", scope: "project", dryRun: true })

		expect(result.rules.map((r) => r.name)).toEqual(["tabs"])
		expect(result.write.changes).toEqual([{ path: join(output, ".cursor", "rules", "tabs.mdc"), status: "create" }])
		await expect(readText(output, ".cursor/rules/tabs.mdc")).rejects.toThrow()
	})

	test("pushed rules pull back into another dialect", async () => {
		const input = tmpDir()
		await writeFiles(input, CURSOR_FILES)
		const { store } = await newStore()
		await pushRules({ store, format: "cursor", input, project: "web", logger: silentLogger })
		const output = tmpDir()

		await pullRules({ store, format: "windsurf", output, project: "web" })

		expect(await readText(output, ".windsurf/rules/typescript.md")).toBe(
			'---\ntrigger: "glob"\nglobs: "*.ts"\n---\n\nUse strict mode.\n',
		)
	})
})

// ─── Batch reads ─────────────────────────────────────────────────────

describe("readSources", () => {
	test("reports unreadable and malformed sources and keeps going", async () => {
		const good = tmpDir()
		await writeFiles(good, CURSOR_FILES)
		const bad = tmpDir()
		await writeFiles(bad, { ".windsurf/rules/x.md": "---\ntrigger: sometimes\n---\n\nBody\n" })
		const missing = join(tmpDir(), "missing")

		const result = await readSources([
			{ format: "cursor", root: good },
			{ format: "windsurf", root: bad },
			{ format: "gemini", root: missing },
		])

		expect(result.sources.map((s) => [s.format, s.rules.length])).toEqual([["cursor", 2]])
		expect(result.failures.map((f) => f.format)).toEqual(["windsurf", "gemini"])
		expect(result.failures[0]?.error).toBeInstanceOf(MalformedMetadataError)
		expect(result.failures[1]?.error).toBeInstanceOf(UnreadableSourceError)
	})

	test("scanAll reads every dialect beneath one root", async () => {
		const root = tmpDir()
		await writeFiles(root, { ...CURSOR_FILES, "GEMINI.md": "Prefer small diffs.\n" })

		const result = await scanAll(root)

		expect(result.failures).toEqual([])
		expect(result.sources.map((s) => [s.format, s.rules.length])).toEqual([
			["cursor", 2],
			["windsurf", 0],
			["copilot", 0],
			["claude", 0],
			["gemini", 1],
			["antigravity", 0],
		])
	})
})
