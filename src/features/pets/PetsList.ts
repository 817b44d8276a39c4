import createButton, { type ButtonElement } from "@ui/Button";
import createErrorBanner, { type ErrorBannerElement } from "@ui/ErrorBanner";
import type { Pet } from "../../models";
import { displayText, type FilteredPet, type MatchRange } from "./filter";
import type { PetsState } from "./pets.types";

export interface PetsListCallbacks {
  onSearchChange?: (value: string) => void;
  onDeletePet?: (pet: Pet) => void;
  onDismissError?: () => void;
}

export interface PetsListInstance {
  readonly element: HTMLElement;
  setCallbacks(callbacks: PetsListCallbacks): void;
  render(state: PetsState): void;
  focusSearch(): void;
  destroy(): void;
}

interface RowElements {
  row: HTMLLIElement;
  name: HTMLSpanElement;
  type: HTMLSpanElement;
  breed: HTMLSpanElement;
  deleteBtn: ButtonElement;
  pet: Pet;
}

export function toDisplayName(pet: Pet): string {
  return displayText(pet.name) || "Unnamed pet";
}

function highlight(element: HTMLElement, text: string, match: MatchRange | null | undefined): void {
  element.textContent = "";
  if (!text) return;
  if (!match || match[0] < 0 || match[1] <= match[0]) {
    element.textContent = text;
    return;
  }
  const [start] = match;
  const end = Math.min(match[1], text.length);
  if (start > 0) {
    element.append(document.createTextNode(text.slice(0, start)));
  }
  const mark = document.createElement("mark");
  mark.textContent = text.slice(start, end);
  element.append(mark);
  if (end < text.length) {
    element.append(document.createTextNode(text.slice(end)));
  }
}

// 5 and "5" are different pets as far as the server is concerned
function rowKey(pet: Pet): string {
  return `${typeof pet.id}:${String(pet.id)}`;
}

function statusText(state: PetsState): string {
  switch (state.status) {
    case "idle":
      return "";
    case "loading":
      return "Loading pets…";
    case "error":
      return state.loadError ?? "Could not load pets.";
    case "ready":
      if (state.petList.length > 0) return "";
      return state.query.trim() ? "No pets match your search." : "No pets yet.";
  }
}

export function createPetsList(
  container: HTMLElement,
  initialCallbacks: PetsListCallbacks = {},
): PetsListInstance {
  let callbacks: PetsListCallbacks = { ...initialCallbacks };

  const root = document.createElement("section");
  root.className = "pets";

  const search = document.createElement("input");
  search.type = "search";
  search.className = "pets__search";
  search.placeholder = "Search pets";
  search.autocomplete = "off";
  search.setAttribute("aria-label", "Search pets");

  const bannerSlot = document.createElement("div");
  bannerSlot.className = "pets__banner";

  const status = document.createElement("p");
  status.className = "pets__status";
  status.setAttribute("role", "status");
  status.hidden = true;

  const list = document.createElement("ul");
  list.className = "pets__list";

  root.append(search, bannerSlot, status, list);
  container.appendChild(root);

  const handleInput = () => {
    callbacks.onSearchChange?.(search.value);
  };
  search.addEventListener("input", handleInput);

  const rows = new Map<string, RowElements>();
  let banner: ErrorBannerElement | null = null;

  function createRow(pet: Pet): RowElements {
    const row = document.createElement("li");
    row.className = "pets__row";

    const name = document.createElement("span");
    name.className = "pets__name";

    const type = document.createElement("span");
    type.className = "pets__type";

    const breed = document.createElement("span");
    breed.className = "pets__breed";

    const entry: RowElements = {
      row,
      name,
      type,
      breed,
      pet,
      deleteBtn: createButton({
        label: "Delete",
        variant: "danger",
        size: "sm",
        className: "pets__delete",
        onClick: (event) => {
          event.preventDefault();
          callbacks.onDeletePet?.(entry.pet);
        },
      }),
    };

    row.append(name, type, breed, entry.deleteBtn.el);
    return entry;
  }

  function updateRow(entry: RowElements, model: FilteredPet): void {
    const { pet } = model;
    entry.pet = pet;
    entry.row.dataset.petId = String(pet.id);

    const name = displayText(pet.name);
    if (name) highlight(entry.name, name, model.nameMatch);
    else entry.name.textContent = toDisplayName(pet);

    const type = displayText(pet.type);
    highlight(entry.type, type, model.typeMatch);
    entry.type.hidden = !type;

    const breed = displayText(pet.breed);
    highlight(entry.breed, breed, model.breedMatch);
    entry.breed.hidden = !breed;

    entry.deleteBtn.update({ ariaLabel: `Delete ${toDisplayName(pet)}` });
  }

  function renderBanner(message: string | null): void {
    if (message === null) {
      banner?.el.remove();
      banner = null;
      return;
    }
    const onDismiss = () => callbacks.onDismissError?.();
    if (!banner) {
      banner = createErrorBanner({ message, onDismiss });
      bannerSlot.appendChild(banner.el);
    } else {
      banner.update({ message, onDismiss });
    }
  }

  function renderRows(models: FilteredPet[]): void {
    const seen = new Set<string>();
    for (const model of models) {
      const key = rowKey(model.pet);
      seen.add(key);
      const entry = rows.get(key) ?? createRow(model.pet);
      rows.set(key, entry);
      updateRow(entry, model);
      // appendChild moves existing rows, so this also restores order
      list.appendChild(entry.row);
    }
    for (const [key, entry] of rows) {
      if (!seen.has(key)) {
        entry.row.remove();
        rows.delete(key);
      }
    }
  }

  function render(state: PetsState): void {
    if (search.value !== state.query) {
      search.value = state.query;
    }
    renderBanner(state.error);
    const text = statusText(state);
    status.textContent = text;
    status.hidden = text.length === 0;
    renderRows(state.matches);
  }

  return {
    element: root,
    setCallbacks(next) {
      callbacks = { ...callbacks, ...next };
    },
    render,
    focusSearch() {
      search.focus();
    },
    destroy() {
      search.removeEventListener("input", handleInput);
      rows.clear();
      banner = null;
      root.remove();
    },
  };
}
