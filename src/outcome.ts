/**
 * Copyright (c) 2024 Discover Financial Services
*/

/**
 * The result of one pipeline stage.  "empty" means the stage ran but found
 * nothing; "failed" means it could not run and carries the reason.
 */
export type Outcome<T> =
    | { kind: "ok"; value: T }
    | { kind: "empty" }
    | { kind: "failed"; error: Error };

export class Outcomes {

    public static ok<T>(value: T): Outcome<T> {
        return { kind: "ok", value };
    }

    public static empty<T>(): Outcome<T> {
        return { kind: "empty" };
    }

    public static failed<T>(e: unknown): Outcome<T> {
        return { kind: "failed", error: e instanceof Error ? e : new Error(String(e)) };
    }

    /** "ok" for a non-empty array, "empty" otherwise. */
    public static fromArray<T>(values: T[]): Outcome<T[]> {
        return values.length > 0 ? Outcomes.ok(values) : Outcomes.empty();
    }

    /** Run fcn, turning a thrown error into a failed outcome. */
    public static attempt<T>(fcn: () => Outcome<T>): Outcome<T> {
        try {
            return fcn();
        } catch (e: unknown) {
            return Outcomes.failed(e);
        }
    }

    public static getOrElse<T>(outcome: Outcome<T>, def: T): T {
        return outcome.kind === "ok" ? outcome.value : def;
    }

    public static map<T, U>(outcome: Outcome<T>, fcn: (value: T) => U): Outcome<U> {
        if (outcome.kind === "ok") return Outcomes.ok(fcn(outcome.value));
        return outcome;
    }

}
