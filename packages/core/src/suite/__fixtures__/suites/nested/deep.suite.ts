import { suite } from "../../../api.js";

export default suite("Deep", {
  tests: {
    works: ({ assert }) => assert.assertNotNull("found"),
  },
});
