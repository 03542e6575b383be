/**
 * Execution Router
 *
 * Sends one sized order to the broker and the copy-trade relay.
 * - Both calls run concurrently and are judged independently
 * - Each call has its own timeout and is never retried
 * - Dry run / forwarding off / trading disabled => simulated success
 * - A target that is not configured => failed outcome (400 NOT_CONFIGURED)
 */

import type { RoutedExecution, TargetName, TargetOutcome } from "../../events/target_outcome.js";
import type { ExecutionTarget, RoutedOrder } from "../adapters/base/ExecutionTarget.js";
import { ExecutionTargetErrorCode, createExecutionTargetError } from "../adapters/base/ExecutionTargetError.js";
import { aggregateOutcomes } from "./aggregate.js";
import { simulationReason, type ExecutionRouterConfig } from "./ExecutionConfig.js";

export type ExecutionTargets = Readonly<Record<TargetName, ExecutionTarget | null>>;

export class ExecutionRouter {
    readonly #config: ExecutionRouterConfig;
    readonly #targets: ExecutionTargets;
    readonly #now: () => number;

    constructor(config: ExecutionRouterConfig, targets: ExecutionTargets, now: () => number = Date.now) {
        this.#config = config;
        this.#targets = targets;
        this.#now = now;
    }

    get config(): ExecutionRouterConfig {
        return this.#config;
    }

    async execute(order: RoutedOrder): Promise<RoutedExecution> {
        const [broker, relay] = await Promise.all([
            this.dispatch("broker", order),
            this.dispatch("relay", order)
        ]);
        return { status: aggregateOutcomes([broker, relay]), broker, relay };
    }

    private async dispatch(name: TargetName, order: RoutedOrder): Promise<TargetOutcome> {
        const outcome = await this.run(name, order);
        console.log(
            `[ROUTER] order_id=${order.orderId} target=${name} success=${outcome.success} ` +
            `status=${outcome.statusCode} simulated=${outcome.simulated} latency=${outcome.latencyMs}ms` +
            (outcome.success ? "" : ` error=${outcome.errorCode ?? "UNKNOWN"} message="${outcome.message}"`)
        );
        return outcome;
    }

    private async run(name: TargetName, order: RoutedOrder): Promise<TargetOutcome> {
        const simulated = simulationReason(this.#config, name);
        if (simulated) {
            return {
                target: name,
                success: true,
                statusCode: 200,
                message: `${name} not called (${simulated})`,
                simulated: true,
                latencyMs: 0
            };
        }

        const target = this.#targets[name];
        if (!target) {
            return {
                target: name,
                success: false,
                statusCode: 400,
                message: `${name} not configured`,
                simulated: false,
                latencyMs: 0,
                errorCode: ExecutionTargetErrorCode.NOT_CONFIGURED
            };
        }

        const startedAt = this.#now();
        try {
            const submission = await target.submit(order);
            return {
                target: name,
                success: true,
                statusCode: submission.statusCode,
                message: submission.message,
                simulated: false,
                latencyMs: this.#now() - startedAt,
                reference: submission.reference
            };
        } catch (error) {
            const normalized = createExecutionTargetError(name, error);
            return {
                target: name,
                success: false,
                statusCode: normalized.statusCode,
                message: normalized.message,
                simulated: false,
                latencyMs: this.#now() - startedAt,
                errorCode: normalized.code
            };
        }
    }
}
