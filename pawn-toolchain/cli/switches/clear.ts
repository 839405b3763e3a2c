// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { i } from '../../i18n';
import { Switch } from '../switch';

export class Clear extends Switch {
  switch = 'clear';
  override title = i`remove every cached archive`;
}
