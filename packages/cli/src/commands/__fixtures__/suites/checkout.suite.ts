import { suite } from "@probity/core";

export default suite("Checkout", {
  tags: ["smoke"],
  tests: {
    "passes with a full cart": ({ assert }) => assert.assertEqual(3, [1, 1, 1].length),
    "fails on an empty cart": ({ assert }) => assert.assertEqual(1, [].length),
  },
});
