import type { TestSource } from "../../types.js";

export const first: TestSource = {
  group: "Named",
  name: "first",
  fn: ({ assert }) => assert.assertTrue(true),
};

export const all: TestSource[] = [
  first,
  { group: "Named", name: "second", fn: ({ assert }) => assert.assertFalse(false) },
];
