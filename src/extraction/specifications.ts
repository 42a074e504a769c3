/**
 * Key/value pairs from specification markup: table rows, "key: value"
 * list items and definition lists.
 */

function textOf(node: Element): string {
  return (node.textContent ?? "").replace(/\s+/g, " ").trim();
}

function fromTable(table: Element): Record<string, string> {
  const specs: Record<string, string> = {};
  for (const row of Array.from(table.querySelectorAll("tr"))) {
    const cells = Array.from(row.querySelectorAll("th, td"));
    const keyCell = cells[0];
    const valueCell = cells[1];
    if (!keyCell || !valueCell) continue;

    const key = textOf(keyCell);
    const value = textOf(valueCell);
    if (key && value) {
      specs[key] = value;
    }
  }
  return specs;
}

function fromList(list: Element): Record<string, string> {
  const specs: Record<string, string> = {};
  for (const item of Array.from(list.querySelectorAll("li"))) {
    const text = textOf(item);
    const separator = text.indexOf(":");
    if (separator <= 0) continue;

    const key = text.slice(0, separator).trim();
    const value = text.slice(separator + 1).trim();
    if (key && value) {
      specs[key] = value;
    }
  }
  return specs;
}

function fromDefinitionList(list: Element): Record<string, string> {
  const specs: Record<string, string> = {};
  const terms = Array.from(list.querySelectorAll("dt"));
  const definitions = Array.from(list.querySelectorAll("dd"));

  terms.forEach((term, index) => {
    const definition = definitions[index];
    if (!definition) return;

    const key = textOf(term);
    const value = textOf(definition);
    if (key && value) {
      specs[key] = value;
    }
  });
  return specs;
}

/**
 * Pairs from one element, or null when it is not a supported container or
 * yields nothing
 */
export function parseSpecifications(element: Element): Record<string, string> | null {
  let specs: Record<string, string>;

  switch (element.tagName.toLowerCase()) {
    case "table":
      specs = fromTable(element);
      break;
    case "ul":
    case "ol":
      specs = fromList(element);
      break;
    case "dl":
      specs = fromDefinitionList(element);
      break;
    default:
      return null;
  }

  return Object.keys(specs).length > 0 ? specs : null;
}
