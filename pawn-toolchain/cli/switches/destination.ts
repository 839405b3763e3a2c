// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { resolve } from 'path';
import { i } from '../../i18n';
import { Switch } from '../switch';

export class Destination extends Switch {
  switch = 'destination';
  override title = i`the folder to install the compiler into`;

  /** the destination as an absolute path, relative to a base folder */
  resolvedValue(base: string): string | undefined {
    const v = this.value;
    return v ? resolve(base, v) : undefined;
  }
}
