import assert from "node:assert/strict"
import { test } from "node:test"
import { PlanningError } from "../src/errors.js"
import { RecapTree } from "../src/recap/recapTree.js"

const plan = (think: string) => ({ think, subtasks: [], result: "" })

test("descend and ascend move through the arena by handle", () => {
    const tree = new RecapTree("root task")
    assert.equal(tree.size, 1)
    assert.equal(tree.depth(), 0)
    assert.ok(tree.isRoot())

    const child = tree.descend("child task", "mof_expert")
    const grandchild = tree.descend("grandchild task", "tio2_expert")
    assert.equal(tree.current, grandchild)
    assert.equal(tree.depth(), 2)
    assert.equal(tree.currentNode.role, "tio2_expert")
    assert.deepEqual(tree.node(tree.root).children, [child])
    assert.deepEqual(tree.node(child).children, [grandchild])

    assert.equal(tree.ascend(), grandchild)
    assert.equal(tree.current, child)
    assert.equal(tree.currentNode.taskName, "child task")
    assert.equal(tree.ascend(), child)
    assert.ok(tree.isRoot())
    assert.equal(tree.size, 3)
})

test("ascend from the root is a planning error", () => {
    const tree = new RecapTree("root task")
    assert.throws(() => tree.ascend(), PlanningError)
    assert.throws(() => tree.node(42), { message: "Unknown task node handle: 42" })
})

test("latestResponse and observations are kept per node", () => {
    const tree = new RecapTree("root task")
    assert.equal(tree.latestResponse(), null)
    tree.recordResponse(plan("first"))
    tree.recordResponse(plan("second"))
    const child = tree.descend("child", "orchestrator")
    tree.recordObservation("found 3 chunks")

    assert.equal(tree.latestResponse(tree.root)?.think, "second")
    assert.equal(tree.latestResponse(child), null)
    assert.deepEqual(tree.node(child).observations, ["found 3 chunks"])
    assert.deepEqual(tree.node(tree.root).observations, [])
})
