import { ElementHandle, Page } from 'puppeteer-core';
import { TypeTarget } from '../browser/typing';
import { LocatorKind, locateByLabel } from './label-locator';

export interface FormElement extends TypeTarget {
  click(): Promise<void>;
  textContent(): Promise<string>;
  getAttribute(name: string): Promise<string | null>;
}

/**
 * What the filler needs from the browser: widgets found by question label,
 * the input holding focus, and a way to wait for requests to finish.
 */
export interface FormPage {
  locate(kind: LocatorKind, label: string): Promise<FormElement[]>;
  focusedInput(): Promise<TypeTarget | null>;
  waitForNetworkIdle(options: { idleTime: number }): Promise<void>;
}

function wrapElement(handle: ElementHandle<Element>): FormElement {
  return {
    type: text => handle.type(text),
    click: () => handle.click(),
    textContent: () => handle.evaluate(node => node.textContent ?? ''),
    getAttribute: name => handle.evaluate((node, attribute) => node.getAttribute(attribute), name)
  };
}

export class PuppeteerFormPage implements FormPage {
  constructor(private page: Page) {}

  async locate(kind: LocatorKind, label: string): Promise<FormElement[]> {
    const arrayHandle = await this.page.evaluateHandle(locateByLabel, kind, label);

    try {
      const count = await arrayHandle.evaluate(elements => elements.length);
      const elements: FormElement[] = [];
      for (let i = 0; i < count; i++) {
        elements.push(wrapElement(await arrayHandle.evaluateHandle((list, index) => list[index], i)));
      }
      return elements;
    } finally {
      await arrayHandle.dispose();
    }
  }

  async focusedInput(): Promise<TypeTarget | null> {
    const handle = await this.page.$('input:focus');
    return handle ? { type: text => handle.type(text) } : null;
  }

  async waitForNetworkIdle(options: { idleTime: number }): Promise<void> {
    await this.page.waitForNetworkIdle(options);
  }
}
