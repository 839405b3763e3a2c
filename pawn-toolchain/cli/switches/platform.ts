// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { supportedPlatforms } from '../../catalog/platforms';
import { i } from '../../i18n';
import { Switch } from '../switch';

export class PlatformSwitch extends Switch {
  switch = 'platform';
  override title = i`the platform to use instead of this machine's (${supportedPlatforms.join(', ')})`;
}
