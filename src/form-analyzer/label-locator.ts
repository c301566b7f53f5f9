export type LocatorKind =
  | 'text-input'
  | 'listbox'
  | 'listbox-options'
  | 'checkbox'
  | 'date-parts'
  | 'date-input'
  | 'list-options'
  | 'submit-button';

/**
 * Finds the widget(s) of a Google Form question from the question's visible
 * label. The label is matched against leaf `span`s (trimmed, whitespace
 * collapsed, case-insensitive) and the last match wins; the widget is then
 * searched for below a fixed ancestor of that span.
 *
 * Runs inside the page through `page.evaluateHandle`, so it must not touch
 * anything outside its own body.
 */
export function locateByLabel(kind: LocatorKind, label: string): Element[] {
  const normalize = (text: string | null): string => (text ?? '').replace(/\s+/g, ' ').trim().toLowerCase();

  const climb = (element: Element, levels: number): Element | null => {
    let current: Element | null = element;
    for (let i = 0; i < levels && current; i++) {
      current = current.parentElement;
    }
    return current;
  };

  const withRole = (root: Element, tag: string, role: string): Element[] =>
    Array.from(root.querySelectorAll(tag)).filter(element => normalize(element.getAttribute('role')) === role);

  const lastOf = (elements: Element[]): Element | undefined => elements[elements.length - 1];

  const wanted = normalize(label);
  const labelSpans = Array.from(document.querySelectorAll('span')).filter(
    span => span.children.length === 0 && normalize(span.textContent) === wanted
  );
  const labelSpan = lastOf(labelSpans);
  if (!labelSpan) {
    return [];
  }

  if (kind === 'submit-button') {
    const button = labelSpan.closest('[role="button"]');
    return button ? [button] : [];
  }

  // Checkboxes sit one level closer to their label than every other widget
  const container = climb(labelSpan, kind === 'checkbox' ? 3 : 4);
  if (!container) {
    return [];
  }

  switch (kind) {
    case 'text-input': {
      const input = container.querySelector('input');
      return input ? [input] : [];
    }

    case 'listbox': {
      const listbox = lastOf(withRole(container, 'div', 'listbox'));
      return listbox ? [listbox] : [];
    }

    case 'listbox-options': {
      const listbox = lastOf(withRole(container, 'div', 'listbox'));
      if (!listbox) {
        return [];
      }
      // The "Choose" placeholder carries an empty data-value
      return withRole(listbox, 'div', 'option').filter(option => {
        const value = option.getAttribute('data-value');
        return value !== null && value.trim() !== '';
      });
    }

    case 'checkbox': {
      const checkbox = lastOf(withRole(container, 'div', 'checkbox'));
      return checkbox ? [checkbox] : [];
    }

    case 'date-parts': {
      const comboboxes = withRole(container, 'input', 'combobox');
      const part = (ariaLabel: string): Element | undefined =>
        lastOf(comboboxes.filter(input => normalize(input.getAttribute('aria-label')) === ariaLabel));

      const month = part('month');
      const day = part('day of the month');
      const year = part('year');
      return month && day && year ? [month, day, year] : [];
    }

    case 'date-input': {
      const dateInput = lastOf(Array.from(container.querySelectorAll('input[type="date"]')));
      return dateInput ? [dateInput] : [];
    }

    case 'list-options': {
      const list = lastOf(withRole(container, 'div', 'list'));
      return list ? withRole(list, 'div', 'listitem') : [];
    }

    default:
      return [];
  }
}
