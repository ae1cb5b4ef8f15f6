import assert from "node:assert/strict";
import { test } from "node:test";
import { MultiKeyCollection } from "../src/multi-key-collection.ts";
import { TransitionKey } from "../src/transition-key.ts";

test("put de-duplicates pairs", () => {
	const map = new MultiKeyCollection<string, string>();

	assert.equal(map.put("A", "a1"), true);
	assert.equal(map.put("A", "a2"), true);
	assert.equal(map.put("A", "a1"), false);
	assert.equal(map.put("B", "a1"), true);

	assert.equal(map.valuesCount(), 3);
	assert.equal(map.valueCount("A"), 2);
	assert.equal(map.keyCount(), 2);
	assert.equal(map.containsKey("A"), true);
	assert.equal(map.containsMapping("A", "a2"), true);
	assert.equal(map.containsMapping("B", "a2"), false);
	assert.equal(map.containsValue("a2"), true);
	assert.equal(map.containsValue("zz"), false);
});

test("removeMapping drops emptied keys", () => {
	const map = new MultiKeyCollection<string, string>();
	map.put("A", "a1");
	map.put("A", "a2");

	assert.equal(map.removeMapping("A", "a1"), true);
	assert.equal(map.removeMapping("A", "a2"), true);
	assert.equal(map.removeMapping("A", "a1"), false);
	assert.equal(map.removeMapping("missing", "a1"), false);

	assert.equal(map.valuesCount(), 0);
	assert.equal(map.containsKey("A"), false);
	assert.equal(map.isEmpty, true);
});

test("remove while iterating a clone", () => {
	const map = new MultiKeyCollection<string, string>();
	map.put("A", "a1");
	map.put("A", "a2");
	map.put("A", "a1");

	for (const value of map.valuesClone("A")) {
		map.removeMapping("A", value);
	}

	assert.equal(map.valuesCount(), 0);
	assert.equal(map.containsKey("A"), false);
});

test("valuesClone is an independent snapshot", () => {
	const map = new MultiKeyCollection<string, number>();
	map.put("A", 1);
	map.put("A", 2);

	const snapshot = map.valuesClone("A");
	map.removeMapping("A", 1);
	map.put("A", 3);

	assert.deepEqual([...snapshot], [1, 2]);
	assert.deepEqual([...map.valuesClone("A")], [2, 3]);

	// and the other way round
	snapshot.clear();
	assert.equal(map.valueCount("A"), 2);
});

test("missing keys read as empty", () => {
	const map = new MultiKeyCollection<string, number>();

	assert.equal(map.valuesClone("nope").size, 0);
	assert.equal(map.valueCount("nope"), 0);
	assert.equal(map.remove("nope").size, 0);
});

test("remove returns former values", () => {
	const map = new MultiKeyCollection<string, number>();
	map.put("A", 1);
	map.put("A", 2);
	map.put("B", 3);

	assert.deepEqual([...map.remove("A")], [1, 2]);
	assert.deepEqual(map.keySetClone(), ["B"]);
	assert.deepEqual(map.allValuesClone(), [3]);

	map.clear();
	assert.equal(map.isEmpty, true);
});

test("composite keys are matched by keyOf", () => {
	const map = new MultiKeyCollection<TransitionKey, string>(TransitionKey.idOf);

	assert.equal(map.put(new TransitionKey("A", "B"), "x"), true);
	assert.equal(map.put(new TransitionKey("A", "B"), "x"), false);
	assert.equal(map.put(new TransitionKey("A", ""), "x"), true);

	assert.deepEqual([...map.valuesClone(new TransitionKey("A", "B"))], ["x"]);
	assert.equal(map.keyCount(), 2);
	assert.equal(map.keySetClone()[0].to, "B");
});

test("forEach visits every pair and tolerates mutation", () => {
	const map = new MultiKeyCollection<string, number>();
	map.put("A", 1);
	map.put("A", 2);
	map.put("B", 3);

	const seen: string[] = [];
	map.forEach((value, key) => {
		seen.push(`${key}${value}`);
		map.removeMapping(key, value);
	});

	assert.deepEqual(seen, ["A1", "A2", "B3"]);
	assert.equal(map.isEmpty, true);
});
