import { describe, expect, test } from "vitest"
import { parseFrontmatter, serializeFrontmatter } from "../../src/utils/yaml"

describe("parseFrontmatter", () => {
	test("splits frontmatter from body", () => {
		const result = parseFrontmatter('---\ndescription: "API rules"\nalwaysApply: false\n---\n\nBody.\n')
		expect(result).toEqual({
			frontmatter: { description: "API rules", alwaysApply: false },
			hasFrontmatter: true,
			body: "Body.",
		})
	})

	test("reads files without frontmatter as body only", () => {
		expect(parseFrontmatter("# Title\n\nText.\n\n")).toEqual({
			frontmatter: {},
			hasFrontmatter: false,
			body: "# Title\n\nText.",
		})
	})

	test("normalizes CRLF", () => {
		const result = parseFrontmatter("---\r\nname: x\r\n---\r\n\r\nLine one\r\nLine two\r\n")
		expect(result.frontmatter).toEqual({ name: "x" })
		expect(result.body).toBe("Line one\nLine two")
	})

	test("accepts an empty frontmatter block", () => {
		const result = parseFrontmatter("---\n---\nBody")
		expect(result.hasFrontmatter).toBe(true)
		expect(result.frontmatter).toEqual({})
		expect(result.body).toBe("Body")
	})

	test("falls back to line parsing for unquoted globs", () => {
		const result = parseFrontmatter("---\nglobs: *.ts\nalwaysApply: false\n---\n\nBody")
		expect(result.frontmatter).toEqual({ globs: "*.ts", alwaysApply: false })
		expect(result.body).toBe("Body")
	})
})

describe("serializeFrontmatter", () => {
	test("quotes strings and keeps key order", () => {
		expect(serializeFrontmatter({ trigger: "glob", globs: "*.ts,*.tsx" }, "Body.")).toBe(
			'---\ntrigger: "glob"\nglobs: "*.ts,*.tsx"\n---\n\nBody.\n',
		)
	})

	test("omits the body section when the body is empty", () => {
		expect(serializeFrontmatter({ alwaysApply: true }, "")).toBe("---\nalwaysApply: true\n---\n")
	})
})
