import Ajv, { type ErrorObject, type SchemaObject, type ValidateFunction } from "ajv";
import addFormats from "ajv-formats";
import { recordType, type Entity, type FieldDescriptor, type RecordType } from "./model";
import { dataValues } from "./fieldIntrospector";

const INT32_MIN = -2147483648;
const INT32_MAX = 2147483647;

/**
 * - `record`: the record's own values; every field present, all rules apply
 * - `filters`: a subset of fields; scalars or lists of the field's kind
 * - `values`: a subset of fields; scalars satisfying every rule except `required`
 */
export type ValidationMode = "record" | "filters" | "values";

export interface ValidationResult {
	readonly valid: boolean;
	readonly invalidFields: readonly string[];
}

/**
 * Generate the JSON Schema used to validate one record type in one mode.
 */
export function generateRecordSchema(type: RecordType, mode: ValidationMode): SchemaObject {
	const properties: Record<string, SchemaObject> = {};

	for (const field of type.fields) {
		const scalar = fieldToJsonSchema(field, mode);
		properties[field.name] = mode === "filters"
			? { anyOf: [scalar, { type: "array", items: scalar }] }
			: scalar;
	}

	return {
		type: "object",
		properties,
		required: mode === "record" ? type.fields.map(f => f.name) : undefined,
		additionalProperties: false,
	};
}

function fieldToJsonSchema(field: FieldDescriptor, mode: ValidationMode): SchemaObject {
	const rules = mode === "filters" ? {} : field.rules ?? {};
	const required = mode === "record" && rules.required === true;

	switch (field.kind) {
		case "int64":
		case "int": {
			const min = field.kind === "int" ? INT32_MIN : Number.MIN_SAFE_INTEGER;
			const max = field.kind === "int" ? INT32_MAX : Number.MAX_SAFE_INTEGER;
			const schema: SchemaObject = {
				type: "integer",
				minimum: Math.max(min, rules.minimum ?? min),
				maximum: Math.min(max, rules.maximum ?? max),
			};
			if (required) schema.not = { const: 0 };
			return schema;
		}
		case "string": {
			const schema: SchemaObject = { type: "string" };
			const minLength = required ? Math.max(1, rules.minLength ?? 1) : rules.minLength;
			if (minLength !== undefined) schema.minLength = minLength;
			if (rules.maxLength !== undefined) schema.maxLength = rules.maxLength;
			if (rules.pattern !== undefined) schema.pattern = rules.pattern;
			if (rules.format !== undefined) schema.format = rules.format;
			return schema;
		}
		case "bool":
			return { type: "boolean" };
	}
}

function decodePointerSegment(segment: string): string {
	return segment.replace(/~1/g, "/").replace(/~0/g, "~");
}

function fieldOfError(error: ErrorObject): string | undefined {
	if (error.keyword === "additionalProperties") return String(error.params.additionalProperty);
	if (error.keyword === "required") return String(error.params.missingProperty);
	const [, first] = error.instancePath.split("/");
	return first === undefined ? undefined : decodePointerSegment(first);
}

/**
 * Checks records and field maps against their record type's declared fields.
 * Compiled schemas are cached per record type name and mode.
 */
export class Validator {
	private readonly _ajv: Ajv;
	private readonly _compiled = new Map<string, ValidateFunction>();

	constructor() {
		this._ajv = new Ajv({ allErrors: true, strict: false });
		addFormats(this._ajv);
	}

	/**
	 * Validate the record's own values, or `candidate` when given.
	 * Invalid field names are listed in candidate key order.
	 */
	validate(record: Entity, candidate?: Readonly<Record<string, unknown>>, mode: Exclude<ValidationMode, "record"> = "filters"): ValidationResult {
		const type = record[recordType];
		const data = candidate ?? dataValues(record);
		const validateFn = this._compile(type, candidate ? mode : "record");

		if (validateFn(data)) {
			return { valid: true, invalidFields: [] };
		}

		const invalid = new Set<string>();
		for (const error of validateFn.errors ?? []) {
			const field = fieldOfError(error);
			if (field !== undefined) invalid.add(field);
		}

		const order = candidate ? Object.keys(candidate) : type.fields.map(f => f.name);
		const invalidFields = order.filter(name => invalid.has(name));
		for (const name of invalid) {
			if (!invalidFields.includes(name)) invalidFields.push(name);
		}

		return { valid: false, invalidFields };
	}

	private _compile(type: RecordType, mode: ValidationMode): ValidateFunction {
		const key = `${type.name}:${mode}`;
		let validateFn = this._compiled.get(key);
		if (!validateFn) {
			validateFn = this._ajv.compile(generateRecordSchema(type, mode));
			this._compiled.set(key, validateFn);
		}
		return validateFn;
	}
}
