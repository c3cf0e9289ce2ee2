// ---------------------------------------------------------------------------
// Atomic Newsletter File Writer
// tmp+rename, mkdir -p, path containment
// ---------------------------------------------------------------------------

import * as fs from "node:fs/promises";
import * as path from "node:path";

export const NEWSLETTER_FILES = {
	html: "newsletter.html",
	manifest: "manifest.json",
	payload: "payload.json",
} as const;

/**
 * Write a file atomically: write to .tmp, then rename.
 * Creates the target directory if it doesn't exist.
 *
 * @param outputDir - Target directory (e.g., "output/2025-07")
 * @param filename - File name inside `outputDir`; must not escape it
 * @returns Absolute path of the written file
 */
export async function writeFileAtomic(outputDir: string, filename: string, content: string): Promise<string> {
	const dir = path.resolve(outputDir);
	const filePath = path.resolve(dir, filename);
	if (!filePath.startsWith(dir + path.sep)) {
		throw new Error(`Path traversal detected: "${filename}" escapes output directory`);
	}

	await fs.mkdir(dir, { recursive: true });

	const tmpPath = `${filePath}.tmp`;
	await fs.writeFile(tmpPath, content, "utf-8");
	await fs.rename(tmpPath, filePath);
	return filePath;
}

export interface NewsletterFiles {
	html: string;
	manifest: unknown;
	payload: unknown;
}

/**
 * Write newsletter.html, manifest.json and payload.json into `outputDir`.
 * JSON is pretty-printed with a trailing newline.
 */
export async function writeNewsletterFiles(outputDir: string, files: NewsletterFiles): Promise<string[]> {
	return [
		await writeFileAtomic(outputDir, NEWSLETTER_FILES.html, files.html),
		await writeFileAtomic(outputDir, NEWSLETTER_FILES.manifest, `${JSON.stringify(files.manifest, null, 2)}\n`),
		await writeFileAtomic(outputDir, NEWSLETTER_FILES.payload, `${JSON.stringify(files.payload, null, 2)}\n`),
	];
}
