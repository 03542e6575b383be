#!/usr/bin/env node
/**
 * send_signal - post test signals to a running gateway.
 *
 *   tsx core/scripts/send_signal.ts --side BUY --price 39250 --sl 150 --tp 300
 *   tsx core/scripts/send_signal.ts --burst 10 --price 34500 --max-move 50 --delay 10
 *
 * URL and token default to GATEWAY_URL / GATEWAY_TOKEN.
 */

import { parseArgs } from "node:util";
import { setTimeout as sleep } from "node:timers/promises";
import { loadEnvFile } from "../gateway-api/config.js";
import type { Side } from "../signal/signal_contract.js";
import { randomWalkBurst, timestampPrefix, type TestSignalPayload } from "./signal_burst.js";

const USAGE = `Usage: send_signal [options]
  --url <url>          gateway base URL (default $GATEWAY_URL or http://localhost:8080)
  --token <token>      gateway token (default $GATEWAY_TOKEN)
  --symbol <symbol>    default US30
  --side <BUY|SELL>    default BUY; random per signal in burst mode when omitted
  --price <n>          entry / starting price (default 34600)
  --sl <n> --tp <n>    stop / target distances
  --type <unit>        distance unit for sl/tp (default points)
  --risk <pct>         risk percent
  --order-id <id>      client order id (single mode)
  --burst <n>          send n random-walk signals
  --max-move <n>       burst price step (default 50)
  --delay <sec>        pause between burst signals (default 10)
  --dry                post to /dryrun instead of /webhook`;

function numberOption(name: string, raw: string | undefined, fallback?: number): number | undefined {
    if (raw === undefined) {
        return fallback;
    }
    const value = Number(raw);
    if (!Number.isFinite(value)) {
        throw new Error(`--${name} must be a number, got "${raw}"`);
    }
    return value;
}

function sideOption(raw: string | undefined): Side | undefined {
    if (raw === undefined) {
        return undefined;
    }
    const side = raw.toUpperCase();
    if (side === "BUY" || side === "SELL") {
        return side;
    }
    throw new Error(`--side must be BUY or SELL, got "${raw}"`);
}

async function send(url: string, token: string | undefined, payload: TestSignalPayload): Promise<boolean> {
    const headers: Record<string, string> = { "content-type": "application/json" };
    if (token) {
        headers.authorization = `Bearer ${token}`;
    }

    try {
        const response = await fetch(url, { method: "POST", headers, body: JSON.stringify(payload) });
        const text = await response.text();
        const tag = response.ok ? "OK" : "FAIL";
        console.log(`[SEND] ${tag} ${response.status} ${payload.action} ${payload.symbol} @ ${payload.price} order_id=${payload.order_id}`);
        console.log(text);
        return response.ok;
    } catch (error) {
        console.error(`[SEND] request failed order_id=${payload.order_id}: ${error instanceof Error ? error.message : String(error)}`);
        return false;
    }
}

async function main(): Promise<number> {
    const { values } = parseArgs({
        options: {
            url: { type: "string" },
            token: { type: "string" },
            symbol: { type: "string", default: "US30" },
            side: { type: "string" },
            price: { type: "string" },
            sl: { type: "string" },
            tp: { type: "string" },
            type: { type: "string", default: "points" },
            risk: { type: "string" },
            "order-id": { type: "string" },
            burst: { type: "string" },
            "max-move": { type: "string" },
            delay: { type: "string" },
            dry: { type: "boolean", default: false },
            help: { type: "boolean", short: "h", default: false },
        },
    });

    if (values.help) {
        console.log(USAGE);
        return 0;
    }

    loadEnvFile();
    const base = (values.url ?? process.env.GATEWAY_URL ?? "http://localhost:8080").replace(/\/+$/, "");
    const url = `${base}${values.dry ? "/dryrun" : "/webhook"}`;
    const token = values.token ?? process.env.GATEWAY_TOKEN;

    const sideRaw = sideOption(values.side);

    const price = numberOption("price", values.price, 34600) ?? 34600;
    const sl = numberOption("sl", values.sl);
    const tp = numberOption("tp", values.tp);
    const riskPct = numberOption("risk", values.risk);
    const burst = numberOption("burst", values.burst);

    let payloads: TestSignalPayload[];
    if (burst !== undefined) {
        payloads = randomWalkBurst({
            symbol: values.symbol,
            count: Math.max(Math.floor(burst), 0),
            startPrice: price,
            maxMove: numberOption("max-move", values["max-move"], 50) ?? 50,
            side: sideRaw,
            sl,
            tp,
            distanceType: values.type,
            riskPct,
            idPrefix: timestampPrefix(new Date()),
        });
    } else {
        payloads = [{
            symbol: values.symbol,
            action: sideRaw ?? "BUY",
            price,
            order_id: values["order-id"] ?? `BOT_${Math.floor(Date.now() / 1000)}`,
            ...(sl !== undefined ? { sl, sl_type: values.type } : {}),
            ...(tp !== undefined ? { tp, tp_type: values.type } : {}),
            ...(riskPct !== undefined ? { risk_pct: riskPct } : {}),
        }];
    }

    const delayMs = (numberOption("delay", values.delay, 10) ?? 10) * 1000;
    let failures = 0;
    for (const [index, payload] of payloads.entries()) {
        if (index > 0 && delayMs > 0) {
            await sleep(delayMs);
        }
        if (!(await send(url, token, payload))) {
            failures++;
        }
    }

    console.log(`[SEND] done sent=${payloads.length} failed=${failures}`);
    return failures === 0 ? 0 : 1;
}

main()
    .then((code) => process.exit(code))
    .catch((error: unknown) => {
        console.error(`[SEND] ${error instanceof Error ? error.message : String(error)}`);
        console.error(USAGE);
        process.exit(1);
    });
