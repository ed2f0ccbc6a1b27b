import { AppError, InvalidCoordinateError } from "./errors.js";
import { toPairs } from "./geo.js";
import { MIN_ADDRESS_LENGTH, MIN_VERTICES } from "./commands.js";
import { parseCoordinate } from "./utils/parseCoordinate.js";
import { parseSelection } from "./utils/parseSelection.js";
import type { Commands, GeocodeResponse, ListEntry } from "./commands.js";
import type { Coordinate } from "./types.js";

/** Line-oriented terminal I/O, so the menu can run against readline or a script */
export interface Prompt {
  ask(question: string): Promise<string>;
  say(line: string): void;
}

function showList(prompt: Prompt, entries: ListEntry[]) {
  prompt.say("\nAvailable neighborhoods:");
  for (const { number, name } of entries) {
    prompt.say(`${number}. ${name}`);
  }
}

async function createNeighborhood(commands: Commands, prompt: Prompt) {
  const name = (await prompt.ask("Enter neighborhood name: ")).trim();
  if (!name) {
    prompt.say("Neighborhood name is required!");
    return;
  }

  prompt.say(`\nEnter coordinates for ${name} (lat,lng format). Enter 'done' when finished:`);
  prompt.say("Example: 32.0853,34.7818");

  const points: Coordinate[] = [];
  for (;;) {
    const input = (await prompt.ask("Enter coordinate (lat,lng) or 'done': ")).trim();
    if (input.toLowerCase() === "done") {
      if (points.length < MIN_VERTICES) {
        prompt.say(`A neighborhood needs at least ${MIN_VERTICES} points!`);
        continue;
      }
      break;
    }

    try {
      points.push(parseCoordinate(input));
    } catch (err) {
      if (!(err instanceof InvalidCoordinateError)) throw err;
      prompt.say("Invalid format! Please use 'latitude,longitude' format");
    }
  }

  commands.create({ command: "create", name, coordinates: toPairs(points) });
  prompt.say(`\nNeighborhood '${name}' has been saved!`);
}

function listNeighborhoods(commands: Commands, prompt: Prompt) {
  const { neighborhoods } = commands.list();
  if (neighborhoods.length === 0) {
    prompt.say("No saved neighborhoods!");
    return;
  }
  showList(prompt, neighborhoods);
}

async function deleteNeighborhood(commands: Commands, prompt: Prompt) {
  const { neighborhoods } = commands.list();
  if (neighborhoods.length === 0) {
    prompt.say("No saved neighborhoods to delete!");
    return;
  }
  showList(prompt, neighborhoods);

  for (;;) {
    const choice = (await prompt.ask("\nEnter the number of the neighborhood to delete (or 'cancel'): ")).trim();
    if (choice.toLowerCase() === "cancel") {
      prompt.say("Deletion cancelled.");
      return;
    }

    if (!/^\d+$/.test(choice)) {
      prompt.say("Please enter a valid number or 'cancel'");
      continue;
    }

    const number = parseInt(choice, 10);
    if (number < 1 || number > neighborhoods.length) {
      prompt.say("Invalid number! Please try again.");
      continue;
    }

    const { deleted } = commands.remove({ command: "delete", number });
    prompt.say(`\nNeighborhood '${deleted}' has been deleted!`);
    return;
  }
}

async function chooseSelection(prompt: Prompt, count: number): Promise<string> {
  prompt.say("\nEnter neighborhood numbers to check (separate with commas)");
  prompt.say("Example: 1,3,4");
  prompt.say("Or type 'all' to check all neighborhoods");

  for (;;) {
    const choice = (await prompt.ask("Choice: ")).trim();
    try {
      parseSelection(choice, count);
      return choice;
    } catch (err) {
      if (!(err instanceof AppError)) throw err;
      prompt.say("Invalid choice! Please try again");
    }
  }
}

async function checkAddressSteps(commands: Commands, prompt: Prompt) {
  const { neighborhoods } = commands.list();
  if (neighborhoods.length === 0) {
    prompt.say("No saved neighborhoods! Please create a neighborhood first.");
    return;
  }
  showList(prompt, neighborhoods);

  const selection = await chooseSelection(prompt, neighborhoods.length);

  prompt.say("\nEnter address to check (Hebrew or English):");
  prompt.say("Example: דיזנגוף 50 תל אביב");
  const address = (await prompt.ask("Address: ")).trim();
  if (address.length < MIN_ADDRESS_LENGTH) {
    prompt.say("Address too short!");
    return;
  }

  let found: GeocodeResponse;
  try {
    found = await commands.geocode({ command: "geocode", address });
  } catch (err) {
    if (err instanceof AppError && err.statusCode === 404) {
      prompt.say("Address not found!");
      return;
    }
    throw err;
  }

  prompt.say(`\nFound address: ${found.formattedAddress}`);
  prompt.say(`Coordinates: ${found.coordinate.lat}, ${found.coordinate.lng}`);

  const confirm = (await prompt.ask("\nIs this the correct address? (yes/no): ")).trim().toLowerCase();
  if (confirm !== "yes" && confirm !== "y") {
    prompt.say("Check cancelled.");
    return;
  }

  const { matches } = commands.locate({ command: "locate", point: found.coordinate, selection, mode: "all" });
  if (matches.length === 0) {
    prompt.say("\nAddress is not in any of the selected neighborhoods");
    return;
  }
  prompt.say("\nAddress is in these neighborhoods:");
  for (const name of matches) {
    prompt.say(`- ${name}`);
  }
}

async function checkAddress(commands: Commands, prompt: Prompt) {
  try {
    await checkAddressSteps(commands, prompt);
  } catch (err) {
    if (!(err instanceof AppError)) console.error("Address check failed:", err);
    prompt.say(`Error checking address: ${err instanceof Error ? err.message : String(err)}`);
  }
}

const actions: Record<string, (commands: Commands, prompt: Prompt) => unknown> = {
  "1": createNeighborhood,
  "2": checkAddress,
  "3": listNeighborhoods,
  "4": deleteNeighborhood,
};

export async function runMenu(commands: Commands, prompt: Prompt): Promise<void> {
  for (;;) {
    prompt.say("\n=== Neighborhood Checker ===");
    prompt.say("1. Create new neighborhood");
    prompt.say("2. Check address");
    prompt.say("3. List saved neighborhoods");
    prompt.say("4. Delete neighborhood");
    prompt.say("5. Exit");

    const choice = (await prompt.ask("\nEnter your choice (1-5): ")).trim();
    if (choice === "5") {
      prompt.say("Goodbye!");
      return;
    }

    const action = actions[choice];
    if (!action) {
      prompt.say("Invalid choice. Please try again.");
      continue;
    }

    try {
      await action(commands, prompt);
    } catch (err) {
      if (!(err instanceof AppError)) throw err;
      prompt.say(`Error: ${err.message}`);
    }
  }
}
