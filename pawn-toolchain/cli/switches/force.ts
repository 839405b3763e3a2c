// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { i } from '../../i18n';
import { Switch } from '../switch';

export class Force extends Switch {
  switch = 'force';
  override title = i`download again even when the cache has the archive`;
}
