import assert from 'node:assert/strict';
import test from 'node:test';
import { STATION_STRATEGIES, resolveStation, resolveStationWithStrategy } from '../src/sync/stationResolver';
import { makeRun } from './helpers';

test('station tag wins over every other source', () => {
  const run = makeRun({
    runName: 'processed_data_PETROLINA_20240101',
    tags: { station: 'ARCO_VERDE', station_name: 'CARUARU' },
    params: { station_name: 'GARANHUNS' }
  });
  assert.equal(resolveStation(run), 'ARCO_VERDE');
});

test('falls back to station_name tag, then station_name param', () => {
  assert.equal(resolveStation(makeRun({ tags: { station_name: 'CARUARU' } })), 'CARUARU');
  assert.equal(resolveStation(makeRun({ params: { station_name: 'GARANHUNS' } })), 'GARANHUNS');
});

test('a present but blank station value leaves the run unresolved', () => {
  const run = makeRun({ tags: { station: '  ' }, params: { station_name: 'SURUBIM' } });
  assert.equal(resolveStation(run), null);
  assert.equal(resolveStation(makeRun({ params: { station_name: '' }, runName: 'estacao_IBIMIRIM' })), null);
});

test('metadata values are returned verbatim', () => {
  assert.equal(resolveStation(makeRun({ tags: { station_name: ' Sao Jose ' } })), ' Sao Jose ');
});

test('extracts the station from processed_data run names', () => {
  assert.equal(resolveStation(makeRun({ runName: 'processed_data_PETROLINA_20240101' })), 'PETROLINA');
  assert.equal(resolveStation(makeRun({ runName: 'processed_data_ARCO_VERDE_120000' })), 'ARCO_VERDE');
  assert.equal(resolveStation(makeRun({ runName: 'processed_data_SERRA_TALHADA' })), 'SERRA_TALHADA');
});

test('only the last numeric token of a processed_data name is dropped', () => {
  assert.equal(resolveStation(makeRun({ runName: 'processed_data_SAO_JOSE_20240101_1200' })), 'SAO_JOSE_20240101');
});

test('processed_data names with nothing but a timestamp do not resolve', () => {
  assert.equal(resolveStation(makeRun({ runName: 'processed_data_20240101' })), null);
});

test('keyword run names yield the token after the keyword', () => {
  assert.equal(resolveStation(makeRun({ runName: 'imputacao_CABROBO_20240102' })), 'CABROBO');
  assert.equal(resolveStation(makeRun({ runName: 'daily_Imputation_FLORESTA' })), 'FLORESTA');
  assert.equal(resolveStation(makeRun({ runName: 'estacao_IBIMIRIM' })), 'IBIMIRIM');
});

test('keywords are tried in their fixed order', () => {
  const resolution = resolveStationWithStrategy(makeRun({ runName: 'station_A_imputacao_B' }));
  assert.deepEqual(resolution, { station: 'B', strategy: 'run_name:keyword' });
});

test('a keyword at the end of the name resolves to nothing', () => {
  assert.equal(resolveStation(makeRun({ runName: 'weekly_station' })), null);
});

test('runs without any station metadata are unresolvable', () => {
  assert.equal(resolveStation(makeRun({ runName: 'baseline-model-v2' })), null);
});

test('reports which strategy matched', () => {
  const resolution = resolveStationWithStrategy(makeRun({ params: { station_name: 'OURICURI' } }));
  assert.deepEqual(resolution, { station: 'OURICURI', strategy: 'param:station_name' });
  assert.deepEqual(
    STATION_STRATEGIES.map((strategy) => strategy.name),
    ['tag:station', 'tag:station_name', 'param:station_name', 'run_name:processed_data', 'run_name:keyword']
  );
});
