// tests/foodEntryService.spec.ts

import { InvalidEntryError } from "../src/domain/errors";
import {
  buildRecipe,
  entryFromCandidate,
  entryFromCustomFood,
  scaleFoodEntry,
  validateFoodEntry,
} from "../src/services/foodEntryService";
import { YOGURT, food } from "./helpers";

const oats = food("Oats", 50, 190, { proteinG: 6.5, carbsG: 33.5, fatsG: 3.5 }, { sodiumMg: 3, sugarG: 0.5, fiberG: 5 });

describe("scaleFoodEntry", () => {
  it("scales every nutrient by the same ratio", () => {
    const doubled = scaleFoodEntry(oats, 100);
    expect(doubled).toEqual(
      food("Oats", 100, 380, { proteinG: 13, carbsG: 67, fatsG: 7 }, { sodiumMg: 6, sugarG: 1, fiberG: 10 })
    );
  });

  it("leaves the source entry untouched", () => {
    scaleFoodEntry(oats, 25);
    expect(oats.grams).toBe(50);
    expect(oats.calories).toBe(190);
  });

  it("gets back to the original portion", () => {
    const back = scaleFoodEntry(scaleFoodEntry(oats, 130), 50);
    expect(back.calories).toBeCloseTo(190);
    expect(back.micros.fiberG).toBeCloseTo(5);
  });

  it("rejects a non-positive quantity", () => {
    expect(() => scaleFoodEntry(oats, 0)).toThrow(InvalidEntryError);
  });
});

describe("entryFromCustomFood", () => {
  const bar = {
    name: "Protein bar",
    servingSizeG: 60,
    calories: 240,
    proteinG: 20,
    carbsG: 24,
    fatsG: 8,
    micros: { sodiumMg: 150, sugarG: 3, fiberG: 6 },
  };

  it("portions by serving size", () => {
    const half = entryFromCustomFood(bar, 30);
    expect(half).toEqual(food("Protein bar", 30, 120, { proteinG: 10, carbsG: 12, fatsG: 4 }, { sodiumMg: 75, sugarG: 1.5, fiberG: 3 }));
  });

  it("produces nothing for a zero serving size", () => {
    expect(entryFromCustomFood({ ...bar, servingSizeG: 0 }, 30)).toBeNull();
  });
});

describe("entryFromCandidate", () => {
  it("scales per-100 g values to the chosen weight", () => {
    const entry = entryFromCandidate(YOGURT, 200);
    expect(entry.name).toBe("Greek Yogurt");
    expect(entry.grams).toBe(200);
    expect(entry.calories).toBe(194);
    expect(entry.proteinG).toBe(18);
    expect(entry.micros.sodiumMg).toBe(72);
    expect(entry.micros.sugarG).toBeCloseTo(7.2);
  });

  it("rejects a non-positive quantity", () => {
    expect(() => entryFromCandidate(YOGURT, -10)).toThrow(InvalidEntryError);
  });
});

describe("buildRecipe", () => {
  it("sums ingredient weights and nutrients", () => {
    const milk = food("Milk", 200, 84, { proteinG: 6.8, carbsG: 9.6, fatsG: 2 }, { sodiumMg: 88, sugarG: 10 });
    const recipe = buildRecipe("Overnight oats", [oats, milk]);

    expect(recipe.name).toBe("Overnight oats");
    expect(recipe.servingSizeG).toBe(250);
    expect(recipe.calories).toBe(274);
    expect(recipe.proteinG).toBeCloseTo(13.3);
    expect(recipe.micros.sodiumMg).toBe(91);
    expect(recipe.micros.fiberG).toBe(5);
  });

  it("needs at least one ingredient", () => {
    expect(() => buildRecipe("Empty", [])).toThrow(InvalidEntryError);
  });
});

describe("validateFoodEntry", () => {
  it("fills micronutrients an entry omits", () => {
    const entry = validateFoodEntry({ name: "Rice", grams: 100, calories: 130, proteinG: 2.7, carbsG: 28, fatsG: 0.3 });
    expect(entry.micros).toEqual({ sodiumMg: 0, sugarG: 0, fiberG: 0 });
  });

  it("lists what is wrong", () => {
    let caught: unknown;
    try {
      validateFoodEntry({ ...oats, name: "" });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(InvalidEntryError);
    expect(caught).toMatchObject({ issues: ["name: name is required"] });
  });
});
