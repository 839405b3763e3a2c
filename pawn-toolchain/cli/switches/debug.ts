// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { i } from '../../i18n';
import { Switch } from '../switch';

export class Debug extends Switch {
  switch = 'debug';
  override title = i`show diagnostic messages with timestamps`;
}
