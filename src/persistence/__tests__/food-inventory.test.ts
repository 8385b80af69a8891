import { describe, it, expect, vi, beforeEach } from "vitest";

const { mockQuery } = vi.hoisted(() => ({
  mockQuery: vi.fn(),
}));

vi.mock("../../db/connection.js", () => ({
  default: { query: mockQuery, connect: vi.fn() },
}));

import { addFoodToInventory, getUserFoods, removeFoodFromInventory } from "../food-inventory.js";
import { addProgressEntry } from "../progress.js";

describe("food inventory", () => {
  beforeEach(() => {
    mockQuery.mockReset();
  });

  it("lists food names", async () => {
    mockQuery.mockResolvedValueOnce({ rows: [{ food_name: "Eggs" }, { food_name: "Rice" }] });
    expect(await getUserFoods(1)).toEqual(["Eggs", "Rice"]);
  });

  it("reports whether an add inserted a row", async () => {
    mockQuery.mockResolvedValueOnce({ rows: [], rowCount: 1 }).mockResolvedValueOnce({ rows: [], rowCount: 0 });

    expect(await addFoodToInventory(1, " Eggs ")).toBe(true);
    expect(await addFoodToInventory(1, "Eggs")).toBe(false);
    expect(mockQuery.mock.calls[0][1]).toEqual([1, "Eggs"]);
  });

  it("reports whether a remove deleted a row", async () => {
    mockQuery.mockResolvedValueOnce({ rows: [], rowCount: 0 });
    expect(await removeFoodFromInventory(1, "Tofu")).toBe(false);
  });
});

describe("addProgressEntry", () => {
  beforeEach(() => {
    mockQuery.mockReset();
  });

  it("defaults the date in SQL when none is given", async () => {
    mockQuery.mockResolvedValueOnce({ rows: [{ id: 1, weight_kg: 80, height_cm: 180, date: "2026-03-10" }] });

    const entry = await addProgressEntry(1, 80, 180);

    expect(entry.date).toBe("2026-03-10");
    expect(mockQuery).toHaveBeenCalledWith(expect.stringContaining("COALESCE($4::date, (NOW() AT TIME ZONE 'UTC')::date)"), [1, 80, 180, null]);
  });
});
