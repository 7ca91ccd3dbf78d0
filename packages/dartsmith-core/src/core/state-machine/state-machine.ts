import { LifecycleError } from "../errors/errors";
import type { StateMachineConfig, TransitionListener } from "./types";

/**
 * Table-driven lifecycle. A move outside the table throws a LifecycleError
 * and leaves the state alone; listeners run after each accepted move.
 */
export class StateMachine<TState extends string> {
    private state: TState;
    private readonly table: Record<TState, readonly TState[]>;
    private readonly label: string;
    private readonly listeners: TransitionListener<TState>[] = [];

    constructor({ transitions, initial, name = "lifecycle" }: StateMachineConfig<TState>) {
        this.state = initial;
        this.table = transitions;
        this.label = name;
    }

    get current(): TState {
        return this.state;
    }

    is(...states: TState[]): boolean {
        return states.includes(this.state);
    }

    /** Move to `target` and return the state left behind. */
    transition(target: TState): TState {
        const from = this.state;
        if (!this.table[from].includes(target)) {
            throw new LifecycleError(`${this.label}: cannot go from "${from}" to "${target}"`);
        }
        this.state = target;
        for (const listener of [...this.listeners]) listener(from, target);
        return from;
    }

    /** Returns a function that detaches the listener. */
    onTransition(listener: TransitionListener<TState>): () => void {
        this.listeners.push(listener);
        return () => {
            const at = this.listeners.indexOf(listener);
            if (at !== -1) this.listeners.splice(at, 1);
        };
    }
}
