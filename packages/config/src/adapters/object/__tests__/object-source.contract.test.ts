import { describeConfigSourceContract } from "../../../ports/__tests__/source.contract"
import { ObjectSource } from "../object-source"

describeConfigSourceContract({
  name: "ObjectSource",
  expectedName: "object:test-overrides",
  make: (_cwd, values) => new ObjectSource(values, "test-overrides"),
})
