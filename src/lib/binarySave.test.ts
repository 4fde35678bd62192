import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { normaliseExtension, resolveSaveTarget, writeBinaryFile } from "./binarySave";

let dir: string;

beforeEach(async () => {
	dir = await mkdtemp(join(tmpdir(), "tagscope-"));
});

afterEach(async () => {
	await rm(dir, { recursive: true, force: true });
});

describe("resolveSaveTarget", () => {
	it("joins name and extension in the directory", async () => {
		expect(
			await resolveSaveTarget(dir, { name: "thumb", extension: ".jpeg" }),
		).toEqual({ ok: true, path: join(dir, "thumb.jpeg") });
	});

	it("requires a name and an extension", async () => {
		expect(await resolveSaveTarget(dir, { name: "", extension: "jpg" })).toEqual(
			{ ok: false, error: "Please enter a name." },
		);
		expect(await resolveSaveTarget(dir, { name: "a", extension: "." })).toEqual(
			{ ok: false, error: "Please enter an extension." },
		);
	});

	it("refuses to overwrite", async () => {
		await writeFile(join(dir, "taken.png"), "x");
		expect(
			await resolveSaveTarget(dir, { name: "taken", extension: "png" }),
		).toEqual({ ok: false, error: "File with this name already exists!" });
	});

	it("strips one leading dot", () => {
		expect(normaliseExtension(".jpg")).toBe("jpg");
		expect(normaliseExtension("jpg")).toBe("jpg");
	});
});

describe("writeBinaryFile", () => {
	it("writes the bytes", async () => {
		const path = join(dir, "out.bin");
		await writeBinaryFile(path, Buffer.from([1, 2, 3]));
		expect([...(await readFile(path))]).toEqual([1, 2, 3]);
	});

	it("fails when the file exists", async () => {
		const path = join(dir, "out.bin");
		await writeFile(path, "old");
		await expect(writeBinaryFile(path, Buffer.from([1]))).rejects.toThrow();
		expect(await readFile(path, "utf8")).toBe("old");
	});
});
