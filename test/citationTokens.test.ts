import assert from "node:assert/strict"
import { test } from "node:test"
import {
    extractCitationAliases,
    extractMemoryIds,
    formatSnippet,
    normalizeAlias,
    normalizeMemId,
} from "../src/evidence/citationTokens.js"

const MEM_A = "0f8e7d6c-5b4a-4392-8a1b-0c9d8e7f6a5b"
const MEM_B = "11111111-2222-4333-8444-555555555555"

test("extractCitationAliases keeps first-seen order and drops repeats", () => {
    const text = "Cu favours CO [C3]; see also [C1] and again [C3]. Not a token: [c4], [C], C5."
    assert.deepEqual(extractCitationAliases(text), ["C3", "C1"])
})

test("extractCitationAliases accepts multi-letter prefixes and empty input", () => {
    assert.deepEqual(extractCitationAliases("[KB12] then [C2]"), ["KB12", "C2"])
    assert.deepEqual(extractCitationAliases(null), [])
    assert.deepEqual(extractCitationAliases(""), [])
})

test("extractMemoryIds strips the mem: prefix and ignores malformed ids", () => {
    const text = `use mem:${MEM_A} and mem:${MEM_B}, repeat mem:${MEM_A}; bad mem:1234`
    assert.deepEqual(extractMemoryIds(text), [MEM_A, MEM_B])
})

test("normalizers remove brackets and prefixes", () => {
    assert.equal(normalizeAlias(" [C7] "), "C7")
    assert.equal(normalizeAlias("C7"), "C7")
    assert.equal(normalizeMemId(`mem:${MEM_A}`), MEM_A)
    assert.equal(normalizeMemId(MEM_B), MEM_B)
})

test("formatSnippet flattens newlines and cuts long text", () => {
    assert.equal(formatSnippet("line one\nline two", 100), "line one line two")
    assert.equal(formatSnippet("abcdefghij", 4), "abcd…")
})
