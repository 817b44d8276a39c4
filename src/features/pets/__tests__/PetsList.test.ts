import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createPetsList, type PetsListInstance } from "../PetsList";
import type { PetsState } from "../pets.types";
import type { Pet } from "../../../models";

function makeState(overrides: Partial<PetsState> = {}): PetsState {
  const petList = overrides.petList ?? [];
  return {
    originalPets: [],
    petList,
    matches: petList.map((pet) => ({ pet })),
    query: "",
    error: null,
    status: "ready",
    loadError: null,
    ...overrides,
  };
}

const rex: Pet = { id: 1, name: "  Rex ", type: "Dog" };
const nameless: Pet = { id: 2, name: "", type: null };

describe("createPetsList", () => {
  let container: HTMLDivElement;
  let page: PetsListInstance;

  beforeEach(() => {
    container = document.createElement("div");
    document.body.appendChild(container);
    page = createPetsList(container);
  });

  afterEach(() => {
    page.destroy();
    container.remove();
    document.body.innerHTML = "";
  });

  function names(): Array<string | null> {
    return Array.from(container.querySelectorAll(".pets__name")).map((el) => el.textContent);
  }

  it("renders one row per displayed pet", () => {
    page.render(makeState({ petList: [rex, nameless] }));

    expect(names()).toEqual(["Rex", "Unnamed pet"]);
    const rows = Array.from(container.querySelectorAll<HTMLLIElement>(".pets__row"));
    expect(rows.map((row) => row.dataset.petId)).toEqual(["1", "2"]);
    const button = rows[0]?.querySelector(".pets__delete");
    expect(button?.getAttribute("aria-label")).toBe("Delete Rex");
  });

  it("passes the row's pet to onDeletePet", () => {
    const onDeletePet = vi.fn();
    page.setCallbacks({ onDeletePet });
    page.render(makeState({ petList: [rex, nameless] }));

    const buttons = container.querySelectorAll<HTMLButtonElement>("button.pets__delete");
    buttons[1]?.click();

    expect(onDeletePet).toHaveBeenCalledTimes(1);
    expect(onDeletePet).toHaveBeenCalledWith(nameless);
  });

  it("reuses rows across renders and drops removed ones", () => {
    page.render(makeState({ petList: [rex, nameless] }));
    const secondRow = container.querySelector('[data-pet-id="2"]');

    page.render(makeState({ petList: [nameless] }));

    expect(container.querySelectorAll(".pets__row")).toHaveLength(1);
    expect(container.querySelector('[data-pet-id="2"]')).toBe(secondRow);
  });

  it("marks the matched part of each field", () => {
    const pickles: Pet = { id: 8, name: "Pickles", type: "Parrot", breed: "African Grey" };
    page.render(
      makeState({
        query: "grey",
        petList: [pickles],
        matches: [{ pet: pickles, nameMatch: null, typeMatch: null, breedMatch: [8, 12] }],
      }),
    );

    const breed = container.querySelector(".pets__breed");
    expect(breed?.textContent).toBe("African Grey");
    expect(breed?.querySelector("mark")?.textContent).toBe("Grey");
    expect(container.querySelector(".pets__name mark")).toBeNull();
    expect(container.querySelector(".pets__name")?.textContent).toBe("Pickles");
  });

  it("drops old marks when the query clears", () => {
    page.render(
      makeState({ query: "re", petList: [rex], matches: [{ pet: rex, nameMatch: [0, 2] }] }),
    );
    expect(container.querySelector(".pets__name mark")?.textContent).toBe("Re");

    page.render(makeState({ petList: [rex] }));
    expect(container.querySelector(".pets__name mark")).toBeNull();
    expect(names()).toEqual(["Rex"]);
  });

  it("shows the error banner and wires Dismiss", () => {
    const onDismissError = vi.fn();
    page.setCallbacks({ onDismissError });
    page.render(makeState({ petList: [rex], error: "Network Error" }));

    expect(container.querySelector(".error-banner__message")?.textContent).toBe("Network Error");
    container.querySelector<HTMLButtonElement>(".error-banner__dismiss")?.click();
    expect(onDismissError).toHaveBeenCalledTimes(1);

    page.render(makeState({ petList: [rex], error: null }));
    expect(container.querySelector(".error-banner")).toBeNull();
  });

  it("reports load status", () => {
    const status = () => container.querySelector<HTMLParagraphElement>(".pets__status");

    page.render(makeState({ status: "loading" }));
    expect(status()?.textContent).toBe("Loading pets…");

    page.render(makeState({ status: "error", loadError: "Service Unavailable" }));
    expect(status()?.textContent).toBe("Service Unavailable");

    page.render(makeState({ query: "zz" }));
    expect(status()?.textContent).toBe("No pets match your search.");

    page.render(makeState({ petList: [rex] }));
    expect(status()?.hidden).toBe(true);
  });

  it("forwards search input and follows the state's query", () => {
    const onSearchChange = vi.fn();
    page.setCallbacks({ onSearchChange });
    const input = container.querySelector<HTMLInputElement>(".pets__search");
    if (!input) throw new Error("search input missing");

    input.value = "rex";
    input.dispatchEvent(new Event("input"));
    expect(onSearchChange).toHaveBeenCalledWith("rex");

    page.render(makeState({ query: "" }));
    expect(input.value).toBe("");
  });
});
