import type { Pet } from "../../models";

export type MatchRange = [number, number];

export interface FilteredPet {
  pet: Pet;
  nameMatch?: MatchRange | null;
  typeMatch?: MatchRange | null;
  breedMatch?: MatchRange | null;
}

/** The string a pet field is rendered as. Match ranges index into it. */
export function displayText(value: string | null | undefined): string {
  return (value ?? "").trim();
}

interface FoldedText {
  folded: string;
  // per folded code unit: the span of displayed text it came from
  starts: number[];
  ends: number[];
}

function foldChar(char: string): string {
  return char.toLowerCase().normalize("NFD").replace(/[\u0300-\u036f]/g, "");
}

function fold(text: string): FoldedText {
  let folded = "";
  const starts: number[] = [];
  const ends: number[] = [];
  let index = 0;
  for (const char of text) {
    const piece = foldChar(char);
    const end = index + char.length;
    if (piece.length === 0 && ends.length > 0) {
      // a stripped mark belongs to the character before it
      ends[ends.length - 1] = end;
    }
    for (let i = 0; i < piece.length; i += 1) {
      starts.push(index);
      ends.push(end);
    }
    folded += piece;
    index = end;
  }
  return { folded, starts, ends };
}

function matchRange(value: string | null | undefined, needle: string): MatchRange | null {
  const text = fold(displayText(value));
  const at = text.folded.indexOf(needle);
  if (at < 0) return null;
  const start = text.starts[at];
  const end = text.ends[at + needle.length - 1];
  if (start === undefined || end === undefined) return null;
  return [start, end];
}

export function projectPets(pets: Pet[], query: string): FilteredPet[] {
  const needle = fold(query.trim()).folded;
  if (!needle) {
    return pets.map((pet) => ({ pet }));
  }
  return pets
    .map<FilteredPet | null>((pet) => {
      const nameMatch = matchRange(pet.name, needle);
      const typeMatch = matchRange(pet.type, needle);
      const breedMatch = matchRange(pet.breed, needle);

      if (!nameMatch && !typeMatch && !breedMatch) {
        return null;
      }

      return { pet, nameMatch, typeMatch, breedMatch };
    })
    .filter((value): value is FilteredPet => value !== null);
}

export function toPetList(models: FilteredPet[]): Pet[] {
  return models.map((model) => model.pet);
}
