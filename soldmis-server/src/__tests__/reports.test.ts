import { describe, it, expect } from "vitest";
import { NotFoundError, SchemaMismatchError } from "../errors.js";
import { bookingsReport } from "../reports/bookings.plugin.js";
import { breakdownReport } from "../reports/breakdown.plugin.js";
import { paymentsReport } from "../reports/payments.plugin.js";
import { PAGE_LOCAL_TOTAL_NOTE, receivablesReport } from "../reports/receivables.plugin.js";
import { summaryReport } from "../reports/summary.plugin.js";
import { unitReport } from "../reports/unit.plugin.js";
import { PAYMENTS_COLUMNS, SALES_COLUMNS, createTestContext } from "./fake-warehouse.js";

const RANGE = { from: "2024-01-01", to: "2024-01-31" };

describe("summary", () => {
  it("sums the sales amounts for the range and applies resolvable filters", async () => {
    const { warehouse, ctx } = createTestContext();
    warehouse.respond = () => [
      {
        bookings: "3",
        gross_sale_value: "1500.50",
        sale_value: null,
        gross_amount_received: 100,
        pending_demand: "0",
        receivables: "250",
        avg_per_sft_price: null,
      },
    ];

    const body = await summaryReport.handler({ ...RANGE, cluster: "north", loan_status: "Approved" }, ctx);

    expect(body).toEqual({
      from: "2024-01-01",
      to: "2024-01-31",
      filters: { cluster: "north", loan_status: "Approved" },
      date_col_used: "BOOKING_DATE",
      totals: {
        bookings: 3,
        gross_sale_value: 1500.5,
        sale_value: 0,
        gross_amount_received: 100,
        pending_demand: 0,
        receivables: 250,
        avg_per_sft_price: 0,
      },
    });
    expect(warehouse.lastQuery.params).toEqual(["2024-01-01", "2024-01-31", "north"]);
    expect(warehouse.lastQuery.sql).toContain(
      'WHERE CAST("BOOKING_DATE" AS date) BETWEEN CAST($1 AS date) AND CAST($2 AS date)\n  AND UPPER(CAST("Cluster" AS text)) = UPPER($3)'
    );
  });

  it("reads missing value columns as zero", async () => {
    const { warehouse, ctx } = createTestContext({ sales: ["DATE", "UNIT_NO"] });

    const body = await summaryReport.handler(RANGE, ctx);

    expect(body.date_col_used).toBe("DATE");
    expect(body.totals.receivables).toBe(0);
    expect(warehouse.lastQuery.sql).toContain('SUM(0) AS "receivables"');
    expect(warehouse.lastQuery.sql).toContain('AVG(0) AS "avg_per_sft_price"');
  });

  it("binds both bounds as dates so the warehouse parses them", async () => {
    const { warehouse, ctx } = createTestContext({ sales: ["DATE", "UNIT_NO"] });

    await summaryReport.handler({ from: "not-a-date", to: "zzz" }, ctx);

    expect(warehouse.lastQuery.params).toEqual(["not-a-date", "zzz"]);
    expect(warehouse.lastQuery.sql).toContain(
      'WHERE CAST("DATE" AS date) BETWEEN CAST($1 AS date) AND CAST($2 AS date)'
    );
  });

  it("fails with SchemaMismatch when no date column exists", async () => {
    const { ctx } = createTestContext({ sales: ["UNIT_NO"] });

    await expect(summaryReport.handler(RANGE, ctx)).rejects.toThrow(
      "No column for date in table sales (tried: BOOKING_DATE, Booking Date, DATE)"
    );
  });

  it("returns identical bodies for identical requests", async () => {
    const { warehouse, ctx } = createTestContext();
    warehouse.respond = () => [{ bookings: "2", sale_value: "10.25" }];

    const first = JSON.stringify(await summaryReport.handler(RANGE, ctx));
    const second = JSON.stringify(await summaryReport.handler(RANGE, ctx));

    expect(second).toBe(first);
  });
});

describe("breakdown", () => {
  it("returns only the realized groups, in the order the warehouse ranks them", async () => {
    const { warehouse, ctx } = createTestContext();
    warehouse.respond = () => [
      { key: "A", bookings: "2", sale_value: "300", gross_amount_received: "50", pending_demand: "10", receivables: "5" },
      { key: "B", bookings: "1", sale_value: "100", gross_amount_received: "0", pending_demand: "0", receivables: "0" },
    ];

    const body = await breakdownReport.handler({ ...RANGE, group_by: "cluster" }, ctx);

    expect(body.group_by).toBe("Cluster");
    expect(body.group_col_used).toBe("Cluster");
    expect(body.rows).toEqual([
      { key: "A", bookings: 2, sale_value: 300, gross_amount_received: 50, pending_demand: 10, receivables: 5 },
      { key: "B", bookings: 1, sale_value: 100, gross_amount_received: 0, pending_demand: 0, receivables: 0 },
    ]);

    const { sql } = warehouse.lastQuery;
    expect(sql).toContain(`COALESCE(CAST("Cluster" AS text), 'UNKNOWN') AS "key"`);
    expect(sql).toContain('GROUP BY CAST("Cluster" AS text)');
    expect(sql).toContain('ORDER BY "bookings" DESC, "key" ASC');
  });

  it("labels a null group as UNKNOWN", async () => {
    const { warehouse, ctx } = createTestContext();
    warehouse.respond = () => [{ key: null, bookings: 4 }];

    const body = await breakdownReport.handler({ ...RANGE, group_by: "SOURCE" }, ctx);
    expect(body.rows[0]?.key).toBe("UNKNOWN");
  });

  it("fails with SchemaMismatch when the group column is missing", async () => {
    const { ctx } = createTestContext();
    await expect(breakdownReport.handler({ ...RANGE, group_by: "LOAN_STATUS" }, ctx)).rejects.toThrow(
      "No column for group_by=LOAN_STATUS in table sales (tried: LOAN_STATUS)"
    );
  });
});

describe("unit", () => {
  it("looks the unit up case-insensitively and returns the stored record", async () => {
    const { warehouse, ctx } = createTestContext();
    warehouse.respond = () => [{ UNIT_NO: "U-100", CUSTOMER_NAME: "Asha" }];

    const body = await unitReport.handler({ unit_no: "u-100" }, ctx);

    expect(body).toEqual({ unit_no: "u-100", record: { UNIT_NO: "U-100", CUSTOMER_NAME: "Asha" } });
    expect(warehouse.lastQuery).toEqual({
      sql: 'SELECT\n  *\nFROM "public"."sales"\nWHERE UPPER(CAST("UNIT_NO" AS text)) = UPPER($1)\nLIMIT $2',
      params: ["u-100", 1],
    });
  });

  it("is NotFound when no record matches", async () => {
    const { ctx } = createTestContext();
    const error = await unitReport.handler({ unit_no: "U-100" }, ctx).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(NotFoundError);
    expect(error).toMatchObject({ status: 404, message: "Unit U-100 not found" });
  });

  it("does not need a date range", async () => {
    const { warehouse, ctx } = createTestContext();
    warehouse.respond = () => [{ UNIT_NO: "U-1" }];
    await expect(unitReport.handler({ unit_no: "U-1" }, ctx)).resolves.toMatchObject({ unit_no: "U-1" });
  });
});

describe("payments", () => {
  it("totals present payment columns and lists all twenty indices", async () => {
    const { warehouse, ctx } = createTestContext();
    warehouse.respond = () => [
      { payments_total: "600", units_with_payments: "2", payment_1: "300", payment_2: "200", payment_3: "100", payment_4: "0" },
    ];

    const body = await paymentsReport.handler({ ...RANGE, cluster: "north" }, ctx);

    expect(body.date_col_used).toBe("DATE");
    expect(body.filters).toEqual({ cluster: "north" });
    expect(body.totals).toEqual({ payments_total: 600, units_with_payments: 2 });
    expect(body.by_payment_index).toHaveLength(20);
    expect(body.by_payment_index.slice(0, 4)).toEqual([
      { payment_index: 1, total: 300 },
      { payment_index: 2, total: 200 },
      { payment_index: 3, total: 100 },
      { payment_index: 4, total: 0 },
    ]);

    // the payments table has no cluster column: echoed, not applied
    expect(warehouse.lastQuery.params).toEqual(["2024-01-01", "2024-01-31"]);
    expect(warehouse.lastQuery.sql).toContain('THEN CAST("UNIT_NO" AS text) END) AS "units_with_payments"');
    expect(warehouse.lastQuery.sql).toContain('SUM(0) AS "payment_20"');
  });

  it("reports zero for every index when no payment column exists", async () => {
    const { warehouse, ctx } = createTestContext({ sales: SALES_COLUMNS, payments: ["DATE", "UNIT_NO"] });
    warehouse.respond = () => [{ payments_total: null, units_with_payments: 0 }];

    const body = await paymentsReport.handler(RANGE, ctx);

    expect(body.totals).toEqual({ payments_total: 0, units_with_payments: 0 });
    expect(body.by_payment_index).toEqual(
      Array.from({ length: 20 }, (_, i) => ({ payment_index: i + 1, total: 0 }))
    );
    expect(warehouse.lastQuery.sql).toContain('SUM(0) AS "payments_total"');
    expect(warehouse.lastQuery.sql).toContain('0 AS "units_with_payments"');
  });

  it("requires a unit column on the payments table", async () => {
    const { ctx } = createTestContext({ sales: SALES_COLUMNS, payments: ["DATE", "PAYMENT_1"] });
    await expect(paymentsReport.handler(RANGE, ctx)).rejects.toBeInstanceOf(SchemaMismatchError);
  });
});

describe("receivables", () => {
  const row = (unit: string, receivables: string) => ({
    unit_no: unit,
    customer_name: "Asha",
    cluster: "North",
    unit_type: "Villa",
    source: "Direct",
    sale_agreement_status: "Signed",
    receivables,
    pending_demand: "100",
    gross_amount_received: "5000",
  });

  it("binds the threshold and limit and sums only the returned page", async () => {
    const { warehouse, ctx } = createTestContext();
    warehouse.respond = () => [row("U-1", "900")];

    const body = await receivablesReport.handler({ ...RANGE, min_receivable: "500", limit: "1" }, ctx);

    expect(warehouse.lastQuery.params).toEqual(["2024-01-01", "2024-01-31", 500, 1]);
    expect(warehouse.lastQuery.sql).toContain('ORDER BY "receivables" DESC\nLIMIT $4');
    expect(body.rows).toEqual([
      {
        unit_no: "U-1",
        customer_name: "Asha",
        cluster: "North",
        unit_type: "Villa",
        source: "Direct",
        sale_agreement_status: "Signed",
        receivables: 900,
        pending_demand: 100,
        gross_amount_received: 5000,
      },
    ]);
    expect(body.total_receivables_in_list).toBe(900);
    expect(body.notes).toBe(PAGE_LOCAL_TOTAL_NOTE);
  });

  it("adds up every row of the page", async () => {
    const { warehouse, ctx } = createTestContext();
    warehouse.respond = () => [row("U-1", "900"), row("U-2", "800.5")];

    const body = await receivablesReport.handler(RANGE, ctx);

    expect(body.min_receivable).toBe(1);
    expect(body.limit).toBe(200);
    expect(body.total_receivables_in_list).toBe(1700.5);
  });

  it("requires a receivables column", async () => {
    const { ctx } = createTestContext({ sales: ["BOOKING_DATE", "UNIT_NO"], payments: PAYMENTS_COLUMNS });
    await expect(receivablesReport.handler(RANGE, ctx)).rejects.toThrow(
      "No column for receivables in table sales (tried: RECEIVABLES)"
    );
  });
});

describe("bookings", () => {
  it("filters sold units and joins payments received in the period", async () => {
    const { warehouse, ctx } = createTestContext();
    warehouse.respond = () => [
      {
        cluster: "North",
        unit_no: "U-1",
        customer_name: "Asha",
        source: "Direct",
        approved_price: "1000",
        gross_price: "1200",
        payments_received_in_period: "300",
        discount: "200",
      },
    ];

    const body = await bookingsReport.handler(RANGE, ctx);

    expect(body).toEqual({
      from: "2024-01-01",
      to: "2024-01-31",
      filters: { sold_only: true },
      date_col_used: "BOOKING_DATE",
      sold_status_col_used: "SOLD_UNSOLD_ID",
      payments_joined: true,
      count: 1,
      rows: [
        {
          cluster: "North",
          unit_no: "U-1",
          customer_name: "Asha",
          source: "Direct",
          approved_price: 1000,
          gross_price: 1200,
          payments_received_in_period: 300,
          discount: 200,
        },
      ],
    });

    const { sql, params } = warehouse.lastQuery;
    expect(params).toEqual(["2024-01-01", "2024-01-31", "SOLD", "2024-01-01", "2024-01-31", 200]);
    expect(sql).toContain('UPPER(CAST("SOLD_UNSOLD_ID" AS text)) = UPPER($3)');
    expect(sql).toContain('LEFT JOIN "payments_agg" "p" ON UPPER("s"."unit_no") = "p"."unit_key"');
    expect(sql).toContain('("s"."gross_price" - "s"."approved_price") AS "discount"');
    expect(sql).toContain('ORDER BY "approved_price" DESC, "unit_no" ASC');
  });

  it("skips the sold filter when sold_only is false", async () => {
    const { warehouse, ctx } = createTestContext();

    const body = await bookingsReport.handler({ ...RANGE, sold_only: "false", limit: "10" }, ctx);

    expect(body.filters).toEqual({ sold_only: false });
    expect(warehouse.lastQuery.params).toEqual(["2024-01-01", "2024-01-31", "2024-01-01", "2024-01-31", 10]);
  });

  it("reports zero payments when the payments table cannot be joined", async () => {
    const { warehouse, ctx } = createTestContext({ sales: SALES_COLUMNS, payments: ["DATE", "UNIT_NO"] });

    const body = await bookingsReport.handler(RANGE, ctx);

    expect(body.payments_joined).toBe(false);
    expect(warehouse.lastQuery.sql).not.toContain("LEFT JOIN");
    expect(warehouse.lastQuery.sql).toContain('0 AS "payments_received_in_period"');
    expect(warehouse.lastQuery.params).toEqual(["2024-01-01", "2024-01-31", "SOLD", 200]);
  });

  it("ignores sold_only when the table has no sold-status column", async () => {
    const sales = SALES_COLUMNS.filter((c) => c !== "SOLD_UNSOLD_ID");
    const { warehouse, ctx } = createTestContext({ sales, payments: PAYMENTS_COLUMNS });

    const body = await bookingsReport.handler(RANGE, ctx);

    expect(body.sold_status_col_used).toBeNull();
    expect(body.filters).toEqual({ sold_only: true });
    expect(warehouse.lastQuery.params).not.toContain("SOLD");
  });
});
