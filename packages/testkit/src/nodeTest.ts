import { strict as assert } from "node:assert";
import { describe, test } from "node:test";

export { assert, describe, test };
