/**
 * Test doubles for packages that build on the pipeline.
 */

export { FakeUpstream, type RecordedCall } from "./upstream/testing.js";
export { DEFAULT_POINTS, makeRoute } from "./providers/testing.js";
