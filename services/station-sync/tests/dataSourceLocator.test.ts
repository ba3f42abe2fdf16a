import assert from 'node:assert/strict';
import test from 'node:test';
import { DataSourceLocator } from '../src/sync/dataSourceLocator';
import { FakeObjectStore } from './helpers';

const PREFIX = 'dados_imputados/resultados/dados_para_update_neon_';

test('finds the dataset under the underscore form first', async () => {
  const store = new FakeObjectStore({
    [`${PREFIX}ARCO_VERDE.csv`]: 'a',
    [`${PREFIX}ARCO VERDE.csv`]: 'b'
  });
  const locator = new DataSourceLocator(store);

  assert.equal(await locator.find('ARCO_VERDE'), `${PREFIX}ARCO_VERDE.csv`);
  assert.deepEqual(store.listed, [`${PREFIX}ARCO_VERDE`]);
});

test('falls back to the space separated form', async () => {
  const store = new FakeObjectStore({ [`${PREFIX}SERRA TALHADA.csv`]: 'a' });
  const locator = new DataSourceLocator(store);

  assert.equal(await locator.find('SERRA_TALHADA'), `${PREFIX}SERRA TALHADA.csv`);
  assert.deepEqual(store.listed, [`${PREFIX}SERRA_TALHADA`, `${PREFIX}SERRA TALHADA`]);
});

test('returns null when nothing matches', async () => {
  const store = new FakeObjectStore({ [`${PREFIX}CARUARU.csv`]: 'a' });
  const locator = new DataSourceLocator(store);

  assert.equal(await locator.find('PETROLINA'), null);
});

test('ignores keys with other extensions and matches the extension case-insensitively', async () => {
  const store = new FakeObjectStore({
    [`${PREFIX}CARUARU.parquet`]: 'a',
    [`${PREFIX}CARUARU.CSV`]: 'b'
  });
  const locator = new DataSourceLocator(store);

  assert.equal(await locator.find('CARUARU'), `${PREFIX}CARUARU.CSV`);
});

test('picks the lexicographically first key without a model', async () => {
  const store = new FakeObjectStore({
    [`${PREFIX}CARUARU_Modelo_B.csv`]: 'b',
    [`${PREFIX}CARUARU_Modelo_A.csv`]: 'a'
  });
  const locator = new DataSourceLocator(store);

  assert.equal(await locator.find('CARUARU'), `${PREFIX}CARUARU_Modelo_A.csv`);
});

test('prefers the key containing the model token', async () => {
  const store = new FakeObjectStore({
    [`${PREFIX}CARUARU_Modelo_A.csv`]: 'a',
    [`${PREFIX}CARUARU_Modelo_B.csv`]: 'b'
  });
  const locator = new DataSourceLocator(store);

  assert.equal(await locator.find('CARUARU', 'Modelo_B'), `${PREFIX}CARUARU_Modelo_B.csv`);
  assert.equal(await locator.find('CARUARU', 'Modelo_Z'), `${PREFIX}CARUARU_Modelo_A.csv`);
});

test('honours a custom prefix and extension', async () => {
  const store = new FakeObjectStore({ 'exports/PETROLINA.txt': 'a' });
  const locator = new DataSourceLocator(store, { prefix: 'exports/', extension: '.txt' });

  assert.equal(await locator.find('PETROLINA'), 'exports/PETROLINA.txt');
});
