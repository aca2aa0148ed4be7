import type { Role } from "../config/appConfig.js"
import { PlanningError } from "../errors.js"
import type { RecapResponse } from "./subtaskSchema.js"

/** Index into the tree's node arena. */
export type NodeHandle = number

export interface RecapNode {
    readonly handle: NodeHandle
    readonly taskName: string
    readonly role: Role
    readonly parent: NodeHandle | null
    readonly children: NodeHandle[]
    /** Every accepted planning response for this task, oldest first. */
    readonly responses: RecapResponse[]
    readonly observations: string[]
}

/**
 * Task tree for one run. Nodes live in an arena and refer to each other by
 * handle; the tree tracks the root and the node being worked on.
 */
export class RecapTree {
    private readonly nodes: RecapNode[] = []
    readonly root: NodeHandle
    private currentHandle: NodeHandle

    constructor(rootTask: string, rootRole: Role = "orchestrator") {
        this.root = this.allocate(rootTask, rootRole, null)
        this.currentHandle = this.root
    }

    private allocate(taskName: string, role: Role, parent: NodeHandle | null): NodeHandle {
        const handle = this.nodes.length
        this.nodes.push({ handle, taskName, role, parent, children: [], responses: [], observations: [] })
        return handle
    }

    get size(): number {
        return this.nodes.length
    }

    get current(): NodeHandle {
        return this.currentHandle
    }

    get currentNode(): RecapNode {
        return this.node(this.currentHandle)
    }

    node(handle: NodeHandle): RecapNode {
        const found = this.nodes[handle]
        if (!found) throw new PlanningError(`Unknown task node handle: ${handle}`)
        return found
    }

    isRoot(handle: NodeHandle = this.currentHandle): boolean {
        return this.node(handle).parent === null
    }

    depth(handle: NodeHandle = this.currentHandle): number {
        let depth = 0
        let parent = this.node(handle).parent
        while (parent !== null) {
            depth += 1
            parent = this.node(parent).parent
        }
        return depth
    }

    /** Adds a child under the current node and makes it current. */
    descend(taskName: string, role: Role): NodeHandle {
        const child = this.allocate(taskName, role, this.currentHandle)
        this.node(this.currentHandle).children.push(child)
        this.currentHandle = child
        return child
    }

    /** Makes the parent current and returns the finished child. */
    ascend(): NodeHandle {
        const finished = this.currentHandle
        const parent = this.node(finished).parent
        if (parent === null) throw new PlanningError("Cannot ascend from the root task.")
        this.currentHandle = parent
        return finished
    }

    recordResponse(response: RecapResponse, handle: NodeHandle = this.currentHandle) {
        this.node(handle).responses.push(response)
    }

    recordObservation(observation: string, handle: NodeHandle = this.currentHandle) {
        this.node(handle).observations.push(observation)
    }

    latestResponse(handle: NodeHandle = this.currentHandle): RecapResponse | null {
        const responses = this.node(handle).responses
        return responses[responses.length - 1] ?? null
    }
}
