/**
 * Equity series / audit log / notifier tests
 */

import { afterEach, beforeEach, describe, it } from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { ReasonCode } from "../events/admission_event.js";
import { auditEventId, type AuditRecord } from "../events/audit_record.js";
import { EquitySeries } from "./equity_series.js";
import { JsonlAuditLog } from "./audit_log.js";
import { DiscordNotifier, NotifyColor, buildEmbed } from "./notifier.js";
import type { FetchLike } from "../exchange/adapters/base/http.js";

function record(orderId: string, localDate: string): AuditRecord {
    return {
        event_type: "SIGNAL_PROCESSED",
        event_id: auditEventId(orderId, 1, "ok"),
        order_id: orderId,
        status: "ok",
        reason_code: ReasonCode.EXECUTED,
        reason: "",
        tv_symbol: "US30",
        instrument: "US30_USD",
        side: "BUY",
        price: 39250,
        sl_price: 39100,
        tp_price: 39550,
        risk_pct_requested: 0.05,
        risk_pct_applied: 0.05,
        units: 3,
        balance: 1_000_000,
        balance_degraded: false,
        dry_run: true,
        trading_enabled: true,
        guards: [],
        broker: null,
        relay: null,
        received_at: 1,
        completed_at: 2,
        local_date: localDate,
    };
}

let tmpDir = "";

beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "gateway-ops-"));
});

afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
});

describe("EquitySeries", () => {
    it("uses the first healthy sample of the day as the baseline", async () => {
        const series = new EquitySeries(null, () => 1000);

        assert.equal(await series.observe(10_000, false, "2026-03-02"), 10_000);
        assert.equal(await series.observe(9_800, false, "2026-03-02"), 10_000);
        assert.equal(series.latest()?.balance, 9_800);
    });

    it("never records degraded balances", async () => {
        const series = new EquitySeries(null);
        assert.equal(await series.observe(1_000_000, true, "2026-03-02"), null);
        assert.equal(series.latest(), undefined);

        await series.observe(10_000, false, "2026-03-02");
        assert.equal(await series.observe(1_000_000, true, "2026-03-02"), 10_000);
        assert.equal(series.latest()?.balance, 10_000);
    });

    it("starts a fresh baseline after a date rollover", async () => {
        const series = new EquitySeries(null);
        await series.observe(10_000, false, "2026-03-02");
        await series.observe(9_800, false, "2026-03-02");

        assert.equal(await series.observe(9_800, false, "2026-03-03"), 9_800);
        assert.equal(series.firstForDate("2026-03-03")?.balance, 9_800);
        assert.equal(series.firstForDate("2026-03-02")?.balance, 10_000);
    });

    it("persists samples and reloads them on init", async () => {
        const file = path.join(tmpDir, "nested", "equity.jsonl");
        const series = new EquitySeries(file, () => 42);
        await series.init();
        await series.record(10_000, "2026-03-02");
        await series.record(9_900, "2026-03-02");
        await series.record(9_950, "2026-03-03");
        await series.flush();

        await fs.appendFile(file, "not json\n{\"ts\":1}\n");

        const reloaded = new EquitySeries(file);
        await reloaded.init();
        assert.equal(reloaded.firstForDate("2026-03-02")?.balance, 10_000);
        assert.equal(reloaded.latest()?.balance, 9_950);

        const day = await reloaded.read("2026-03-02");
        assert.deepEqual(day, [
            { ts: 42, local_date: "2026-03-02", balance: 10_000 },
            { ts: 42, local_date: "2026-03-02", balance: 9_900 },
        ]);
    });
});

describe("JsonlAuditLog", () => {
    it("appends one line per record and reads them back by date", async () => {
        const log = new JsonlAuditLog(path.join(tmpDir, "trades.jsonl"));
        await log.init();
        await Promise.all([
            log.append(record("a", "2026-03-02")),
            log.append(record("b", "2026-03-03")),
            log.append(record("c", "2026-03-03")),
        ]);

        const content = await fs.readFile(log.filePath, "utf-8");
        assert.equal(content.trim().split("\n").length, 3);

        const day = await log.read({ localDate: "2026-03-03" });
        assert.deepEqual(day.map((r) => r.order_id), ["b", "c"]);

        const last = await log.read({ limit: 1 });
        assert.deepEqual(last.map((r) => r.order_id), ["c"]);
    });

    it("logs write failures instead of throwing", async () => {
        // a directory cannot be appended to
        const log = new JsonlAuditLog(tmpDir);
        await assert.doesNotReject(log.append(record("a", "2026-03-02")));
    });

    it("reads nothing from a missing file", async () => {
        const log = new JsonlAuditLog(path.join(tmpDir, "missing.jsonl"));
        assert.deepEqual(await log.read(), []);
    });
});

describe("DiscordNotifier", () => {
    it("builds an embed with one inline field per value", () => {
        const embed = buildEmbed(
            "New Signal",
            { status: "ok", units: 3, sl: null, skipped: undefined },
            NotifyColor.OK,
            new Date("2026-03-02T14:00:00Z")
        );
        assert.deepEqual(embed, {
            title: "New Signal",
            color: 0x2ecc71,
            fields: [
                { name: "status", value: "ok", inline: true },
                { name: "units", value: "3", inline: true },
                { name: "sl", value: "null", inline: true },
            ],
            timestamp: "2026-03-02T14:00:00.000Z",
        });
    });

    it("posts embeds and drains pending sends", async () => {
        const bodies: string[] = [];
        const fetchImpl: FetchLike = async (_url, init) => {
            bodies.push(String(init?.body));
            return new Response(null, { status: 204 });
        };
        const notifier = new DiscordNotifier({ webhookUrl: "http://notify.test/hook", fetchImpl });

        notifier.notify("one", { a: 1 });
        notifier.notify("two", { b: 2 }, NotifyColor.ERROR);
        assert.equal(notifier.pendingCount, 2);

        await notifier.drain();
        assert.equal(notifier.pendingCount, 0);
        assert.equal(bodies.length, 2);
        assert.equal(JSON.parse(bodies[1] ?? "{}").embeds[0].color, NotifyColor.ERROR);
    });

    it("swallows delivery failures after logging them", async () => {
        const fetchImpl: FetchLike = async () => {
            throw new TypeError("fetch failed");
        };
        const notifier = new DiscordNotifier({ webhookUrl: "http://notify.test/hook", fetchImpl });
        notifier.notify("boom", {});
        await notifier.drain();
        assert.equal(notifier.pendingCount, 0);
    });

    it("does nothing without a webhook url", async () => {
        let calls = 0;
        const notifier = new DiscordNotifier({
            fetchImpl: async () => {
                calls++;
                return new Response(null, { status: 204 });
            },
        });
        notifier.notify("ignored", {});
        await notifier.drain();
        assert.equal(notifier.enabled, false);
        assert.equal(calls, 0);
    });
});
