// ---------------------------------------------------------------------------
// Unit Tests: Newsletter File Writer (Atomic File Writes)
// ---------------------------------------------------------------------------

import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { NEWSLETTER_FILES, writeFileAtomic, writeNewsletterFiles } from "@/lib/html/writer";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

describe("writeFileAtomic", () => {
	let tmpDir: string;

	beforeEach(async () => {
		tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "newsletter-html-"));
	});

	afterEach(async () => {
		await fs.rm(tmpDir, { recursive: true, force: true });
	});

	it("creates the output file and returns its absolute path", async () => {
		const filePath = await writeFileAtomic(tmpDir, "newsletter.html", "<h1>Test</h1>");

		expect(filePath).toBe(path.join(path.resolve(tmpDir), "newsletter.html"));
		expect(await fs.readFile(filePath, "utf-8")).toBe("<h1>Test</h1>");
	});

	it("creates the output directory if it doesn't exist", async () => {
		const outputDir = path.join(tmpDir, "2025", "07");
		await writeFileAtomic(outputDir, "newsletter.html", "<p>July</p>");

		const dirExists = await fs
			.stat(outputDir)
			.then((s) => s.isDirectory())
			.catch(() => false);
		expect(dirExists).toBe(true);
	});

	it("overwrites existing files", async () => {
		await writeFileAtomic(tmpDir, "newsletter.html", "<h1>V1</h1>");
		await writeFileAtomic(tmpDir, "newsletter.html", "<h1>V2</h1>");

		expect(await fs.readFile(path.join(tmpDir, "newsletter.html"), "utf-8")).toBe("<h1>V2</h1>");
	});

	it("does not leave .tmp files after successful write", async () => {
		await writeFileAtomic(tmpDir, "newsletter.html", "<h1>Test</h1>");

		const files = await fs.readdir(tmpDir);
		expect(files.filter((f) => f.endsWith(".tmp"))).toHaveLength(0);
	});

	it("rejects file names that escape the output directory", async () => {
		await expect(writeFileAtomic(tmpDir, "../outside.html", "x")).rejects.toThrow(
			'Path traversal detected: "../outside.html" escapes output directory',
		);
		await expect(fs.stat(path.join(tmpDir, "..", "outside.html"))).rejects.toThrow();
	});
});

describe("writeNewsletterFiles", () => {
	let tmpDir: string;

	beforeEach(async () => {
		tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "newsletter-files-"));
	});

	afterEach(async () => {
		await fs.rm(tmpDir, { recursive: true, force: true });
	});

	it("writes the document and pretty-printed JSON companions", async () => {
		const paths = await writeNewsletterFiles(tmpDir, {
			html: "<div>Body</div>\n",
			manifest: { runId: "run-1", sections: [] },
			payload: { subject: "Hello", content: "<div>Body</div>\n", preview_text: "Hi" },
		});

		expect(paths.map((p) => path.basename(p))).toEqual([
			NEWSLETTER_FILES.html,
			NEWSLETTER_FILES.manifest,
			NEWSLETTER_FILES.payload,
		]);
		expect(await fs.readFile(path.join(tmpDir, "newsletter.html"), "utf-8")).toBe("<div>Body</div>\n");
		expect(await fs.readFile(path.join(tmpDir, "manifest.json"), "utf-8")).toBe(
			'{\n  "runId": "run-1",\n  "sections": []\n}\n',
		);
		expect(await fs.readFile(path.join(tmpDir, "payload.json"), "utf-8")).toBe(
			'{\n  "subject": "Hello",\n  "content": "<div>Body</div>\\n",\n  "preview_text": "Hi"\n}\n',
		);
	});
});
