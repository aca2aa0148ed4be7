import assert from "node:assert/strict"
import fs from "node:fs"
import path from "node:path"
import { afterEach, test } from "node:test"
import { buildSystemPrompt, defaultConfigPath, loadAppConfig, parseAppConfig, roleInstruction } from "../src/config/appConfig.js"
import { ConfigurationError } from "../src/errors.js"
import { PACKAGE_ROOT } from "../src/loadEnv.js"
import { isRecord } from "../src/util/json.js"

const CONFIG_PATH = path.join(PACKAGE_ROOT, "config", "default.json")

function rawConfig(): Record<string, unknown> {
    const parsed: unknown = JSON.parse(fs.readFileSync(CONFIG_PATH, "utf8"))
    assert.ok(isRecord(parsed))
    return { ...parsed }
}

afterEach(() => {
    delete process.env.RECAP_HASH_EMBEDDING_DIM
})

test("default config path is the packaged config", () => {
    assert.equal(process.env.RECAP_CONFIG_PATH, undefined)
    assert.equal(defaultConfigPath(), CONFIG_PATH)
})

test("loadAppConfig reads the packaged config and its priors", () => {
    const config = loadAppConfig(CONFIG_PATH)
    assert.equal(config.source_path, CONFIG_PATH)
    assert.equal(config.citations.alias_prefix, "C")
    assert.equal(config.memory.near_duplicate_threshold, 0.92)
    assert.equal(config.memory.hash_embedding_dim, 32)
    assert.equal(config.priors.system_description_path, path.join(PACKAGE_ROOT, "config", "priors", "system_description.md"))
    assert.ok(config.priors.microenvironment_mof_md.length > 0)
    assert.equal(roleInstruction(config, "mof_expert"), config.roles.mof_expert)
})

test("buildSystemPrompt joins the base prompt and the three priors", () => {
    const config = loadAppConfig(CONFIG_PATH)
    const prompt = buildSystemPrompt(config)
    assert.ok(prompt.startsWith(config.prompts.system_base.trim()))
    assert.ok(prompt.endsWith(config.priors.microenvironment_mof_md.trim()))
})

test("invalid sections raise ConfigurationError with the key path", () => {
    const raw = rawConfig()
    raw.citations = { alias_prefix: "c1" }
    assert.throws(
        () => parseAppConfig(raw, CONFIG_PATH),
        (error: unknown) => error instanceof ConfigurationError && error.key === "citations.alias_prefix",
    )
})

test("a missing prior file is a ConfigurationError", () => {
    const raw = rawConfig()
    raw.priors = {
        system_description_path: "priors/does_not_exist.md",
        microenvironment_tio2_path: "priors/microenvironment_tio2.md",
        microenvironment_mof_path: "priors/microenvironment_mof.md",
    }
    assert.throws(
        () => parseAppConfig(raw, CONFIG_PATH),
        (error: unknown) => error instanceof ConfigurationError && error.key === "priors.system_description_path",
    )
})

test("the embedding dimension can be overridden and is clamped to 8", () => {
    process.env.RECAP_HASH_EMBEDDING_DIM = "4"
    assert.equal(parseAppConfig(rawConfig(), CONFIG_PATH).memory.hash_embedding_dim, 8)
    process.env.RECAP_HASH_EMBEDDING_DIM = "64"
    assert.equal(parseAppConfig(rawConfig(), CONFIG_PATH).memory.hash_embedding_dim, 64)
})
