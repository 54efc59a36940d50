import { Command, Option } from "commander";
import * as fs from "fs";
import * as path from "path";
import { Controller } from "./controller";
import { openDatabase as defaultOpenDatabase, type Database } from "./database";
import { coerceStringMap, fieldSlots } from "./fieldIntrospector";
import type { FieldValue, RecordFactory } from "./model";
import { ValidationError } from "./errors";
import type { OrderBy } from "./sqlGenerator";
import type { StoreLogger } from "./logger";
import { sampleConstructors, sampleTypes } from "./sampleModels";

const SAMPLE_SCHEMA_PATH = path.join(__dirname, "..", "sql", "sample-schema.sql");

export interface CliDependencies {
	openDatabase?: (connectionString: string) => Promise<Database>;
	logger?: StoreLogger;
}

interface ConnectionOptions {
	connection: string;
	prefix?: string;
}

function parsePairs(pairs: readonly string[] | undefined): Record<string, string> {
	const result: Record<string, string> = {};
	for (const pair of pairs ?? []) {
		const eq = pair.indexOf("=");
		if (eq <= 0) {
			throw new Error(`Expected field=value, got ${JSON.stringify(pair)}`);
		}
		result[pair.slice(0, eq)] = pair.slice(eq + 1);
	}
	return result;
}

function parseOrder(order: readonly string[] | undefined): OrderBy[] | undefined {
	return order?.map(entry => {
		const [field, direction = "asc"] = entry.split(":");
		if (direction !== "asc" && direction !== "desc") {
			throw new Error(`Invalid order direction ${JSON.stringify(direction)} in ${JSON.stringify(entry)}; expected asc or desc`);
		}
		const orderBy: OrderBy = { field, direction };
		return orderBy;
	});
}

/**
 * Convert `--where` pairs to a filter map. A pair that does not convert is
 * an error here; `--set` pairs are dropped instead.
 */
function parseFilters(factory: RecordFactory, pairs: readonly string[] | undefined): Record<string, FieldValue> {
	const raw = parsePairs(pairs);
	const filters = coerceStringMap(factory(), raw);
	const dropped = Object.keys(raw).filter(key => !(key in filters));
	if (dropped.length > 0) {
		throw new ValidationError("validateFilters", dropped);
	}
	return filters;
}

function factoryFor(type: string): RecordFactory {
	const factory = sampleTypes[type];
	if (!factory) {
		throw new Error(`Unknown record type ${JSON.stringify(type)}; expected one of ${Object.keys(sampleTypes).join(", ")}`);
	}
	return factory;
}

function withConnection(command: Command): Command {
	return command
		.addOption(
			new Option("-c, --connection <string>", "PostgreSQL connection string, or pglite:[path]")
				.env("DATABASE_URL")
				.makeOptionMandatory()
		)
		.addOption(new Option("-p, --prefix <string>", "Table name prefix").env("TABLE_PREFIX"));
}

/**
 * Command line tool over the sample Group and Person record types.
 */
export function createProgram(deps: CliDependencies = {}): Command {
	const open = deps.openDatabase ?? defaultOpenDatabase;

	async function withController<T>(options: ConnectionOptions, fn: (controller: Controller) => Promise<T>): Promise<T> {
		const db = await open(options.connection);
		try {
			const controller = new Controller(db.client, { tablePrefix: options.prefix, logger: deps.logger });
			return await fn(controller);
		} finally {
			await db.close();
		}
	}

	const program = new Command();

	program
		.name("record-store")
		.description("Store and query the sample Group and Person records")
		.version("1.0.0");

	withConnection(program.command("init"))
		.description("Create the sample tables")
		.action(async (options: ConnectionOptions) => {
			const prefix = options.prefix ?? "";
			if (!/^[A-Za-z0-9_]*$/.test(prefix)) {
				throw new Error(`Invalid table prefix ${JSON.stringify(prefix)}`);
			}
			const sql = fs.readFileSync(SAMPLE_SCHEMA_PATH, "utf-8").replace(/\{\{prefix\}\}/g, prefix);
			const db = await open(options.connection);
			try {
				for (const statement of sql.split(";").map(s => s.trim()).filter(s => s.length > 0)) {
					await db.client.query(statement);
				}
			} finally {
				await db.close();
			}
			console.log("Created sample tables.");
		});

	withConnection(program.command("add"))
		.description("Insert a record")
		.argument("<type>", "Record type")
		.requiredOption("--set <pairs...>", "field=value pairs")
		.action(async (type: string, options: ConnectionOptions & { set: string[] }) => {
			const record = factoryFor(type)();
			const values = coerceStringMap(record, parsePairs(options.set));
			for (const slot of fieldSlots(record, false)) {
				const value = values[slot.name];
				if (value !== undefined) slot.set(value);
			}
			await withController(options, controller => controller.save(record));
			console.log(`Saved ${type} ${record.id}`);
		});

	withConnection(program.command("show"))
		.description("Print one record by identity")
		.argument("<type>", "Record type")
		.argument("<id>", "Record identity")
		.action(async (type: string, id: string, options: ConnectionOptions) => {
			const record = factoryFor(type)();
			await withController(options, controller => controller.load(record, id));
			console.log(record.id === 0 ? "Not found." : JSON.stringify(record));
		});

	withConnection(program.command("list"))
		.description("Print records matching filters")
		.argument("<type>", "Record type")
		.option("--where <pairs...>", "field=value filters")
		.option("--order <fields...>", "field or field:desc")
		.option("--limit <number>", "Maximum rows", parseInt)
		.option("--offset <number>", "Rows to skip", parseInt)
		.action(async (type: string, options: ConnectionOptions & { where?: string[]; order?: string[]; limit?: number; offset?: number }) => {
			const factory = factoryFor(type);
			const filters = parseFilters(factory, options.where);
			const order = parseOrder(options.order);
			await withController(options, async controller => {
				const rows = await controller.get(factory, {
					filters,
					order,
					limit: options.limit,
					offset: options.offset,
					rowTransform: row => JSON.stringify(row),
				});
				for (const line of rows) {
					console.log(line);
				}
			});
		});

	withConnection(program.command("count"))
		.description("Count records matching filters")
		.argument("<type>", "Record type")
		.option("--where <pairs...>", "field=value filters")
		.action(async (type: string, options: ConnectionOptions & { where?: string[] }) => {
			const factory = factoryFor(type);
			const filters = parseFilters(factory, options.where);
			await withController(options, async controller => {
				console.log(String(await controller.getCount(factory, { filters })));
			});
		});

	withConnection(program.command("update"))
		.description("Set fields on every record matching filters")
		.argument("<type>", "Record type")
		.requiredOption("--set <pairs...>", "field=value pairs")
		.option("--where <pairs...>", "field=value filters")
		.action(async (type: string, options: ConnectionOptions & { set: string[]; where?: string[] }) => {
			const factory = factoryFor(type);
			const filters = parseFilters(factory, options.where);
			await withController(options, controller =>
				controller.updateMultiple(factory, parsePairs(options.set), { filters, convertValuesFromString: true })
			);
			console.log("Updated.");
		});

	withConnection(program.command("delete"))
		.description("Delete a record; deleting a group also deletes its persons")
		.argument("<type>", "Record type")
		.argument("<id>", "Record identity")
		.action(async (type: string, id: string, options: ConnectionOptions) => {
			const record = factoryFor(type)();
			const found = await withController(options, async controller => {
				await controller.load(record, id);
				const exists = record.id !== 0;
				await controller.delete(record, { constructors: sampleConstructors });
				return exists;
			});
			console.log(found ? `Deleted ${type} ${id}` : "Not found.");
		});

	return program;
}
