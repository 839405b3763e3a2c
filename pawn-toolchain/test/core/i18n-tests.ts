// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { strict, throws } from 'assert';
import { writeFile } from 'fs/promises';
import { i, setLocale } from '../../i18n';
import { SuiteLocal } from './SuiteLocal';

describe('i18n', () => {
  const local = new SuiteLocal();
  after(async () => {
    setLocale(undefined);
    await local.after();
  });

  it('resolves templates without a locale', () => {
    strict.equal(i`Downloading ${'x'}...`, 'Downloading x...');
  });

  it('uses the translated template of a loaded locale', async () => {
    const file = local.path('de.json');
    await writeFile(file, JSON.stringify({ 'Downloading$': 'Herunterladen ${p0}...', 'Unpacking$': 42 }));
    setLocale(file);
    strict.equal(i`Downloading ${'x'}...`, 'Herunterladen x...');
    // non-string entries are ignored
    strict.equal(i`Unpacking ${'y'}...`, 'Unpacking y...');
    setLocale(undefined);
    strict.equal(i`Downloading ${'x'}...`, 'Downloading x...');
  });

  it('rejects a locale file that is not an object', async () => {
    const file = local.path('list.json');
    await writeFile(file, '[]');
    throws(() => setLocale(file), /must contain a JSON object/);
  });
});
