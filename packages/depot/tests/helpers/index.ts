/**
 * Test helpers barrel export
 *
 * @example
 * import { createTestContext, publishArtifactory, withTempDir } from "@/tests/helpers"
 */

export * from "@/tests/helpers/artifactory"
export * from "@/tests/helpers/assertions"
export * from "@/tests/helpers/context"
export * from "@/tests/helpers/fs"
