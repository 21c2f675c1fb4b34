import { suite } from "../../api.js";

export default suite("Math", {
  tests: {
    adds: ({ assert }) => assert.assertEqual(2, 1 + 1),
  },
});
