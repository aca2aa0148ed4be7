import assert from "node:assert/strict"
import { afterEach, test } from "node:test"
import { ConfigurationError } from "../src/errors.js"
import { envFlag, envInt, envString, parseEnvFile } from "../src/loadEnv.js"

afterEach(() => {
    for (const key of ["RECAP_TEST_A", "RECAP_TEST_B", "RECAP_TEST_FLAG", "RECAP_TEST_INT"]) delete process.env[key]
})

test("parseEnvFile handles export, quotes and inline comments", () => {
    const parsed = parseEnvFile(
        [
            "# comment",
            "export OPENAI_MODEL=gpt-4o-mini",
            'KB_BASE_URL="http://localhost:9621"',
            "KB_API_KEY='test-secret'",
            "RECAP_POLL_INTERVAL_MS=250 # fast polling",
            'MULTI="a\\nb"',
            "=no-key",
            "not a pair",
        ].join("\n"),
    )
    assert.deepEqual(Object.fromEntries(parsed), {
        OPENAI_MODEL: "gpt-4o-mini",
        KB_BASE_URL: "http://localhost:9621",
        KB_API_KEY: "test-secret",
        RECAP_POLL_INTERVAL_MS: "250",
        MULTI: "a\nb",
    })
})

test("envString returns the first non-empty name", () => {
    process.env.RECAP_TEST_A = "  "
    process.env.RECAP_TEST_B = " second "
    assert.equal(envString(["RECAP_TEST_A", "RECAP_TEST_B"]), "second")
    assert.equal(envString("RECAP_TEST_MISSING", "fallback"), "fallback")
})

test("envFlag understands common spellings", () => {
    process.env.RECAP_TEST_FLAG = "Yes"
    assert.equal(envFlag("RECAP_TEST_FLAG"), true)
    process.env.RECAP_TEST_FLAG = "off"
    assert.equal(envFlag("RECAP_TEST_FLAG", true), false)
    process.env.RECAP_TEST_FLAG = "maybe"
    assert.equal(envFlag("RECAP_TEST_FLAG", true), true)
})

test("envInt rejects non-integers", () => {
    process.env.RECAP_TEST_INT = "42"
    assert.equal(envInt("RECAP_TEST_INT", 1), 42)
    process.env.RECAP_TEST_INT = "4.5"
    assert.throws(
        () => envInt("RECAP_TEST_INT", 1),
        (error: unknown) => error instanceof ConfigurationError && error.key === "RECAP_TEST_INT",
    )
})
