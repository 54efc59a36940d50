import { describe, test, expect, beforeEach, afterEach, vi } from "vitest";
import { PGlite } from "@electric-sql/pglite";
import { createProgram } from "./cli";
import { ValidationError } from "./errors";

/**
 * Runs commands in process against one in-memory PGlite database shared
 * across invocations.
 */
describe("CLI", () => {
	let db: PGlite;
	let output: string[];

	beforeEach(() => {
		db = new PGlite();
		output = [];
		vi.spyOn(console, "log").mockImplementation((...args: unknown[]) => {
			output.push(args.map(String).join(" "));
		});
	});

	afterEach(async () => {
		vi.restoreAllMocks();
		await db.close();
	});

	async function run(command: string, ...args: string[]): Promise<string[]> {
		output = [];
		const program = createProgram({
			openDatabase: async () => ({ client: db, close: async () => {} }),
		});
		program.exitOverride();
		await program.parseAsync([command, "-c", "pglite:", ...args], { from: "user" });
		return output;
	}

	async function seed(): Promise<void> {
		await run("init");
		await run("add", "group", "--set", "name=Admins");
		await run("add", "person", "--set", "name=Ann", "email=ann@example.com", "age=30", "active=true", "groupId=1");
		await run("add", "person", "--set", "name=Bob", "email=bob@example.com", "groupId=1");
	}

	test("init creates the sample tables", async () => {
		expect(await run("init")).toEqual(["Created sample tables."]);
		expect(await run("count", "person")).toEqual(["0"]);
	});

	test("init rejects a prefix that is not an identifier", async () => {
		await expect(run("init", "-p", "bad;prefix")).rejects.toThrow('Invalid table prefix "bad;prefix"');
	});

	test("add prints the generated identity", async () => {
		await run("init");
		expect(await run("add", "group", "--set", "name=Admins", "description=Full access")).toEqual(["Saved group 1"]);
		expect(await run("show", "group", "1")).toEqual(['{"id":1,"name":"Admins","description":"Full access"}']);
	});

	test("add rejects a record that fails validation", async () => {
		await run("init");
		await expect(run("add", "person", "--set", "name=Ann")).rejects.toThrow("Invalid fields: email");
	});

	test("show reports a missing record", async () => {
		await run("init");
		expect(await run("show", "person", "9")).toEqual(["Not found."]);
	});

	test("list filters, orders and pages", async () => {
		await seed();

		expect(await run("list", "person", "--order", "name:desc", "--limit", "1")).toEqual([
			'{"id":2,"name":"Bob","email":"bob@example.com","age":0,"active":false,"groupId":1}',
		]);
		expect(await run("list", "person", "--where", "active=true")).toEqual([
			'{"id":1,"name":"Ann","email":"ann@example.com","age":30,"active":true,"groupId":1}',
		]);
	});

	test("list rejects an unknown order direction", async () => {
		await seed();

		await expect(run("list", "person", "--order", "name:dsc")).rejects.toThrow(
			'Invalid order direction "dsc" in "name:dsc"; expected asc or desc'
		);
		expect(output).toEqual([]);
	});

	test("list rejects filters that do not convert", async () => {
		await seed();

		await expect(run("list", "person", "--where", "bogus=1", "age=old")).rejects.toThrow(ValidationError);
	});

	test("update sets values on matching records", async () => {
		await seed();

		expect(await run("update", "person", "--set", "age=41", "--where", "name=Bob")).toEqual(["Updated."]);
		expect(await run("show", "person", "2")).toEqual([
			'{"id":2,"name":"Bob","email":"bob@example.com","age":41,"active":false,"groupId":1}',
		]);
	});

	test("count applies filters", async () => {
		await seed();

		expect(await run("count", "person", "--where", "groupId=1")).toEqual(["2"]);
		expect(await run("count", "person", "--where", "groupId=2")).toEqual(["0"]);
	});

	test("deleting a group deletes its persons", async () => {
		await seed();

		expect(await run("delete", "group", "1")).toEqual(["Deleted group 1"]);
		expect(await run("count", "person")).toEqual(["0"]);
		expect(await run("delete", "group", "1")).toEqual(["Not found."]);
	});

	test("rejects an unknown record type", async () => {
		await expect(run("count", "team")).rejects.toThrow('Unknown record type "team"; expected one of group, person');
	});

	test("rejects malformed pairs", async () => {
		await run("init");
		await expect(run("add", "group", "--set", "name")).rejects.toThrow('Expected field=value, got "name"');
	});
});
