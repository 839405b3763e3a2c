// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { i } from '../i18n';
import { ConfigurationError } from '../util/exceptions';
import type { Command } from './command';
import { cmdSwitch } from './format';


export abstract class Switch {
  readonly abstract switch: string;
  readonly title: string = '';
  readonly required: boolean;

  constructor(protected command: Command, options?: { required?: boolean }) {
    command.switches.push(this);
    this.required = options?.required || false;
  }

  get valid() {
    return !this.required || this.active;
  }

  #values?: Array<string | undefined>;
  get values() {
    return this.#values || (this.#values = this.command.commandLine.claim(this.switch) || []);
  }

  get value(): string | undefined {
    const v = this.values;
    if (v.length > 1) {
      throw new ConfigurationError(i`Expected a single value for ${cmdSwitch(this.switch)} - found multiple`);
    }
    return v[0];
  }

  get requiredValue(): string {
    const v = this.value;
    if (!v) {
      throw new ConfigurationError(i`Expected a single value for '--${this.switch}'.`);
    }
    return v;
  }

  get active(): boolean {
    const v = this.values;
    return !!v && v.length > 0 && v[v.length - 1] !== 'false';
  }
}
