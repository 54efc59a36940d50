import { describe, it, expect } from "vitest";
import { Validator, generateRecordSchema } from "./validator";
import { recordType } from "./model";
import { Group, Person } from "./sampleModels";

function validPerson(): Person {
	return Object.assign(new Person(), { name: "Ann", email: "ann@example.com", age: 30 });
}

describe("generateRecordSchema", () => {
	const type = new Person()[recordType];

	it("requires every field in record mode", () => {
		const schema = generateRecordSchema(type, "record");

		expect(schema.required).toEqual(["name", "email", "age", "active", "groupId"]);
		expect(schema.additionalProperties).toBe(false);
		expect(schema.properties.name).toEqual({ type: "string", minLength: 1, maxLength: 100 });
		expect(schema.properties.age).toEqual({ type: "integer", minimum: 0, maximum: 150 });
		expect(schema.properties.groupId).toEqual({
			type: "integer",
			minimum: Number.MIN_SAFE_INTEGER,
			maximum: Number.MAX_SAFE_INTEGER,
		});
	});

	it("accepts scalars or lists without rules in filters mode", () => {
		const schema = generateRecordSchema(type, "filters");
		const ageScalar = { type: "integer", minimum: -2147483648, maximum: 2147483647 };

		expect(schema.required).toBeUndefined();
		expect(schema.properties.age).toEqual({ anyOf: [ageScalar, { type: "array", items: ageScalar }] });
	});

	it("drops required but keeps other rules in values mode", () => {
		const schema = generateRecordSchema(type, "values");

		expect(schema.properties.name).toEqual({ type: "string", maxLength: 100 });
		expect(schema.properties.email).toEqual({ type: "string", format: "email" });
	});
});

describe("Validator", () => {
	const validator = new Validator();

	it("accepts a valid record", () => {
		expect(validator.validate(validPerson())).toEqual({ valid: true, invalidFields: [] });
	});

	it("reports required fields left empty in declared order", () => {
		expect(validator.validate(new Person())).toEqual({ valid: false, invalidFields: ["name", "email"] });
	});

	it("applies range and length rules", () => {
		const person = Object.assign(validPerson(), { age: 200 });
		expect(validator.validate(person).invalidFields).toEqual(["age"]);

		const group = Object.assign(new Group(), { name: "x".repeat(51) });
		expect(validator.validate(group).invalidFields).toEqual(["name"]);
	});

	it("rejects unknown and wrong-typed filters", () => {
		expect(validator.validate(new Person(), { name: "Ann", bogus: 1 }).invalidFields).toEqual(["bogus"]);
		expect(validator.validate(new Person(), { age: "x", id: 1 }).invalidFields).toEqual(["age", "id"]);
	});

	it("accepts list filters and ignores rules on filters", () => {
		expect(validator.validate(new Person(), { groupId: [1, 2], age: -1 }).valid).toBe(true);
	});

	it("rejects lists and rule violations in update values", () => {
		expect(validator.validate(new Person(), { groupId: [1] }, "values").invalidFields).toEqual(["groupId"]);
		expect(validator.validate(new Person(), { age: -1, email: "not-an-email" }, "values").invalidFields).toEqual([
			"age",
			"email",
		]);
	});

	it("does not require fields in update values", () => {
		expect(validator.validate(new Person(), { name: "" }, "values").valid).toBe(true);
	});
});
