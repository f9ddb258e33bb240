/**
 * Writer integration test.
 *
 * Tests writeRenderedFiles() with dry-run mode, backups and partial failures
 * against temp directories.
 */
import { join } from "node:path"
import { describe, expect, it } from "vitest"
import { listBackups } from "../../src/backup"
import { WriteError } from "../../src/errors"
import { writeRenderedFiles } from "../../src/writer"
import { readText, useTmpDirs, writeFiles } from "../helpers/tmp"

const tmpDir = useTmpDirs("writer")

describe("writeRenderedFiles()", () => {
	describe("dry-run mode", () => {
		it("reports files that would be written without touching disk", async () => {
			const root = tmpDir()
			await writeFiles(root, { "same.md": "Same.\n", "old.md": "Old.\n" })

			const result = await writeRenderedFiles(
				root,
				{
					files: [
						{ path: "same.md", content: "Same.\n" },
						{ path: "old.md", content: "New.\n" },
						{ path: "nested/new.md", content: "Fresh.\n" },
					],
					warnings: ["a warning"],
				},
				{ dryRun: true },
			)

			expect(result.dryRun).toBe(true)
			expect(result.changes).toEqual([
				{ path: join(root, "same.md"), status: "unchanged" },
				{ path: join(root, "old.md"), status: "update" },
				{ path: join(root, "nested", "new.md"), status: "create" },
			])
			expect(result.filesWritten).toEqual([])
			expect(result.warnings).toEqual(["a warning"])
			expect(await readText(root, "old.md")).toBe("Old.\n")
			await expect(readText(root, "nested/new.md")).rejects.toThrow()
		})
	})

	describe("actual writes", () => {
		it("writes only files whose content changed", async () => {
			const root = tmpDir()
			await writeFiles(root, { "same.md": "Same.\n", "old.md": "Old.\n" })

			const result = await writeRenderedFiles(root, {
				files: [
					{ path: "same.md", content: "Same.\n" },
					{ path: "old.md", content: "New.\n" },
					{ path: "nested/new.md", content: "Fresh.\n" },
				],
				warnings: [],
			})

			expect(result.filesWritten).toEqual([join(root, "old.md"), join(root, "nested", "new.md")])
			expect(await readText(root, "old.md")).toBe("New.\n")
			expect(await readText(root, "nested/new.md")).toBe("Fresh.\n")
			expect(result.backupDir).toBeUndefined()
		})

		it("snapshots changed files before writing when asked", async () => {
			const root = tmpDir()
			const backupsDir = join(tmpDir(), "backups")
			await writeFiles(root, { "old.md": "Old.\n" })

			const result = await writeRenderedFiles(
				root,
				{ files: [{ path: "old.md", content: "New.\n" }], warnings: [] },
				{ backup: { dir: backupsDir, description: "test write" } },
			)

			const backups = await listBackups(backupsDir)
			expect(backups).toHaveLength(1)
			expect(result.backupDir).toBe(backups[0]?.path)
			expect(backups[0]?.manifest.description).toBe("test write")
			expect(backups[0]?.manifest.files.map((f) => f.originalPath)).toEqual([join(root, "old.md")])
		})

		it("skips the backup when nothing changes", async () => {
			const root = tmpDir()
			const backupsDir = join(tmpDir(), "backups")
			await writeFiles(root, { "same.md": "Same.\n" })

			const result = await writeRenderedFiles(
				root,
				{ files: [{ path: "same.md", content: "Same.\n" }], warnings: [] },
				{ backup: { dir: backupsDir } },
			)

			expect(result.backupDir).toBeUndefined()
			expect(await listBackups(backupsDir)).toEqual([])
		})

		it("lists files already written when a later write fails", async () => {
			const root = tmpDir()
			await writeFiles(root, { blocker: "I am a file, not a directory.\n" })

			try {
				await writeRenderedFiles(root, {
					files: [
						{ path: "ok.md", content: "Fine.\n" },
						{ path: "blocker/child.md", content: "Cannot land.\n" },
					],
					warnings: [],
				})
				expect.unreachable()
			} catch (err) {
				expect(err).toBeInstanceOf(WriteError)
				if (err instanceof WriteError) {
					expect(err.path).toBe(join(root, "blocker", "child.md"))
					expect(err.filesWritten).toEqual([join(root, "ok.md")])
				}
			}
			expect(await readText(root, "ok.md")).toBe("Fine.\n")
		})
	})
})
