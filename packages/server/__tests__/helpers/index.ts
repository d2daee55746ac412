export { TEST_NOW, createTestContext, type RescanCall, type TestContext } from "./context";
export { fixturePoint, gpxDocument, writeGpx, writeText, type FixturePoint } from "./gpx";
