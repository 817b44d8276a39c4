import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { AxiosError } from "axios";

vi.mock("@lib/uiLog", () => ({
  logUI: vi.fn(),
}));

import { PetsView } from "../src/PetsView";
import { petsStore } from "@features/pets";
import { TestAdapter } from "@lib/http/adapters/test";
import { __resetHttpAdapter, setHttpAdapter } from "@lib/http/provider";

describe("PetsView", () => {
  let container: HTMLDivElement;
  let server: TestAdapter;

  beforeEach(() => {
    petsStore.__resetForTests();
    server = new TestAdapter({
      pets: [
        { id: 3, name: "Biscuit", type: "Dog" },
        { id: 5, name: "Mittens", type: "Cat" },
        { id: 8, name: "Pickles", type: "Parrot" },
      ],
    });
    setHttpAdapter(server);
    container = document.createElement("div");
    document.body.appendChild(container);
  });

  afterEach(() => {
    __resetHttpAdapter();
    document.body.innerHTML = "";
  });

  function names(): Array<string | null> {
    return Array.from(container.querySelectorAll(".pets__name")).map((el) => el.textContent);
  }

  function clickDelete(id: number): void {
    const button = container.querySelector<HTMLButtonElement>(`[data-pet-id="${id}"] .pets__delete`);
    if (!button) throw new Error(`no delete button for pet ${id}`);
    button.click();
  }

  it("loads and renders the pets", async () => {
    await PetsView(container);
    expect(names()).toEqual(["Biscuit", "Mittens", "Pickles"]);
  });

  it("removes a row once the delete succeeds", async () => {
    await PetsView(container);

    clickDelete(5);

    await vi.waitFor(() => {
      expect(names()).toEqual(["Biscuit", "Pickles"]);
    });
    expect(container.querySelector(".error-banner")).toBeNull();
  });

  it("keeps the row and shows the message when the delete fails", async () => {
    await PetsView(container);
    server.failNext("pets_delete", new AxiosError("Network Error", "ERR_NETWORK"));

    clickDelete(5);

    await vi.waitFor(() => {
      expect(container.querySelector(".error-banner__message")?.textContent).toBe("Network Error");
    });
    expect(names()).toEqual(["Biscuit", "Mittens", "Pickles"]);

    container.querySelector<HTMLButtonElement>(".error-banner__dismiss")?.click();
    expect(container.querySelector(".error-banner")).toBeNull();
    expect(petsStore.getSnapshot().error).toBeNull();
  });

  it("filters through the search box", async () => {
    await PetsView(container);
    const input = container.querySelector<HTMLInputElement>(".pets__search");
    if (!input) throw new Error("search input missing");

    input.value = "pick";
    input.dispatchEvent(new Event("input"));

    expect(names()).toEqual(["Pickles"]);
    expect(container.querySelector(".pets__name mark")?.textContent).toBe("Pick");
  });

  it("tears down the previous mount when mounted again", async () => {
    await PetsView(container);
    await PetsView(container);
    expect(container.querySelectorAll("section.pets")).toHaveLength(1);
    expect(names()).toEqual(["Biscuit", "Mittens", "Pickles"]);
  });
});
