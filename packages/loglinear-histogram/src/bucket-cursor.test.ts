import {expect, test} from 'vitest';
import {unwrap} from '../../shared/src/result.ts';
import {BucketCursor} from './bucket-cursor.ts';
import {histogramConfig} from './config.ts';
import {CountStore} from './count-store.ts';
import {bucketGeometry} from './geometry.ts';
import {IndexMapper} from './index-mapper.ts';

function setup() {
  const geometry = unwrap(
    bucketGeometry(histogramConfig({maxValue: 100, precision: 1})),
  );
  const mapper = new IndexMapper(geometry);
  const store = new CountStore(geometry.bucketsTotal);
  return {geometry, mapper, store};
}

test('yields every bucket in index order', () => {
  const {geometry, mapper, store} = setup();
  store.addAt(20, 3);
  const buckets = [...new BucketCursor(store, mapper)];

  expect(buckets).toHaveLength(geometry.bucketsTotal);
  expect(buckets[0]).toEqual({id: 0, value: 1, count: 0});
  expect(buckets[15]).toEqual({id: 15, value: 16, count: 0});
  expect(buckets[20]).toEqual({id: 20, value: 24, count: 3});
  expect(buckets.at(-1)).toEqual({id: 44, value: 122, count: 0});
});

test('rewinds after reporting done', () => {
  const {geometry, mapper, store} = setup();
  const cursor = new BucketCursor(store, mapper);
  expect([...cursor]).toHaveLength(geometry.bucketsTotal);
  expect(cursor.position).toBe(0);
  expect([...cursor]).toHaveLength(geometry.bucketsTotal);
});

test('reset rewinds a partially read cursor', () => {
  const {mapper, store} = setup();
  const cursor = new BucketCursor(store, mapper);
  cursor.next();
  cursor.next();
  expect(cursor.position).toBe(2);
  cursor.reset();
  expect(cursor.next()).toEqual({
    done: false,
    value: {id: 0, value: 1, count: 0},
  });
});

test('cursors keep independent positions', () => {
  const {mapper, store} = setup();
  const a = new BucketCursor(store, mapper);
  const b = new BucketCursor(store, mapper);
  a.next();
  a.next();
  a.next();
  const first = b.next();
  expect(first.done).toBe(false);
  expect(first.value).toEqual({id: 0, value: 1, count: 0});
  expect(a.next().value).toEqual({id: 3, value: 4, count: 0});
});
