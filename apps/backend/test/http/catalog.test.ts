import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createActor, createTestContext, type Actor, type TestContext } from "../helpers.js";

describe("catalog routes", () => {
  let ctx: TestContext;
  let admin: Actor;
  let customer: Actor;

  beforeEach(async () => {
    ctx = await createTestContext();
    admin = await createActor(ctx, "root", "ADMIN");
    customer = await createActor(ctx, "carol", "CUSTOMER");
  });

  afterEach(async () => {
    await ctx.app.close();
  });

  function createArea(payload: Record<string, unknown>) {
    return ctx.app.inject({
      method: "POST",
      url: "/api/v1/admin/treatment-areas",
      headers: admin.headers,
      payload,
    });
  }

  it("creates a treatment area with defaults", async () => {
    const res = await createArea({ name: "Area1", current_price: 100 });
    expect(res.statusCode).toBe(201);
    expect(res.json()).toEqual({
      name: "Area1",
      current_price: 100,
      deadline_reset: 30,
      is_active: true,
      operate_time: 5,
      created_at: "2025-03-10T09:00:00.000Z",
      updated_at: "2025-03-10T09:00:00.000Z",
    });
  });

  it("rejects a blank name and a negative price together", async () => {
    const res = await createArea({ name: "", current_price: -10 });
    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({
      error: "Validation failed",
      details: {
        formErrors: [],
        fieldErrors: {
          name: ["Area name cannot be empty"],
          current_price: ["Price cannot be negative"],
        },
      },
    });
  });

  it("rejects a duplicate name", async () => {
    await createArea({ name: "Legs" });
    const res = await createArea({ name: "Legs" });
    expect(res.statusCode).toBe(400);
    expect(res.json().details.fieldErrors).toEqual({
      name: ["A treatment area with this name already exists."],
    });
  });

  it("refuses to rename an area", async () => {
    await createArea({ name: "Legs" });
    const res = await ctx.app.inject({
      method: "PATCH",
      url: "/api/v1/admin/treatment-areas/Legs",
      headers: admin.headers,
      payload: { name: "Arms" },
    });
    expect(res.statusCode).toBe(400);
    expect(res.json().details.fieldErrors).toEqual({ name: ["This field cannot be changed."] });
  });

  it("shows customers active areas only", async () => {
    await createArea({ name: "Legs" });
    await createArea({ name: "Face", is_active: false });

    const list = await ctx.app.inject({ method: "GET", url: "/api/v1/treatment-areas", headers: customer.headers });
    expect(list.json().map((a: { name: string }) => a.name)).toEqual(["Legs"]);

    const hidden = await ctx.app.inject({
      method: "GET",
      url: "/api/v1/treatment-areas/Face",
      headers: customer.headers,
    });
    expect(hidden.statusCode).toBe(404);
    expect(hidden.json()).toEqual({ error: "Treatment area not found" });
  });

  it("requires authentication for the public catalog", async () => {
    const res = await ctx.app.inject({ method: "GET", url: "/api/v1/treatment-areas" });
    expect(res.statusCode).toBe(401);
  });

  it("deletes an area together with its schedules", async () => {
    await createArea({ name: "Legs" });
    const schedule = await ctx.app.inject({
      method: "POST",
      url: "/api/v1/admin/area-schedules",
      headers: admin.headers,
      payload: { treatment_area: "Legs", price: 40 },
    });
    expect(schedule.statusCode).toBe(201);

    const res = await ctx.app.inject({
      method: "DELETE",
      url: "/api/v1/admin/treatment-areas/Legs",
      headers: admin.headers,
    });
    expect(res.statusCode).toBe(204);
    expect(await ctx.stores.areaSchedules.list()).toEqual([]);
  });

  describe("area schedules", () => {
    beforeEach(async () => {
      await createArea({ name: "Legs" });
    });

    it("rejects a schedule for an unknown area", async () => {
      const res = await ctx.app.inject({
        method: "POST",
        url: "/api/v1/admin/area-schedules",
        headers: admin.headers,
        payload: { treatment_area: "Nowhere" },
      });
      expect(res.statusCode).toBe(400);
      expect(res.json().details.fieldErrors).toEqual({
        treatment_area: ["Referenced record does not exist."],
      });
    });

    it("rejects an end before the start", async () => {
      const res = await ctx.app.inject({
        method: "POST",
        url: "/api/v1/admin/area-schedules",
        headers: admin.headers,
        payload: {
          treatment_area: "Legs",
          start_time: "2025-03-12T10:00:00Z",
          end_time: "2025-03-12T09:00:00Z",
        },
      });
      expect(res.statusCode).toBe(400);
      expect(res.json().details.fieldErrors).toEqual({ end_time: ["End time must be after start time"] });
    });

    it("lists schedules with a start time as active", async () => {
      const pending = await ctx.app.inject({
        method: "POST",
        url: "/api/v1/admin/area-schedules",
        headers: admin.headers,
        payload: { treatment_area: "Legs", price: 10 },
      });
      const open = await ctx.app.inject({
        method: "POST",
        url: "/api/v1/admin/area-schedules",
        headers: admin.headers,
        payload: { treatment_area: "Legs", price: 20, start_time: "2025-03-12T10:00:00Z" },
      });

      const res = await ctx.app.inject({
        method: "GET",
        url: "/api/v1/area-schedules/active",
        headers: customer.headers,
      });
      expect(res.json().map((s: { id: string }) => s.id)).toEqual([open.json().id]);

      const all = await ctx.app.inject({ method: "GET", url: "/api/v1/area-schedules", headers: customer.headers });
      expect(all.json().map((s: { id: string }) => s.id)).toEqual([open.json().id]);

      const hidden = await ctx.app.inject({
        method: "GET",
        url: `/api/v1/area-schedules/${pending.json().id}`,
        headers: customer.headers,
      });
      expect(hidden.statusCode).toBe(404);
      expect(hidden.json()).toEqual({ error: "Area schedule not found" });

      const shown = await ctx.app.inject({
        method: "GET",
        url: `/api/v1/area-schedules/${open.json().id}`,
        headers: customer.headers,
      });
      expect(shown.statusCode).toBe(200);
    });

    it("answers 404 for a malformed schedule id", async () => {
      const res = await ctx.app.inject({
        method: "GET",
        url: "/api/v1/area-schedules/not-a-uuid",
        headers: customer.headers,
      });
      expect(res.statusCode).toBe(404);
      expect(res.json()).toEqual({ error: "Area schedule not found" });
    });
  });
});
