import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { prioritizeImages, rankImage, UNMATCHED_RANK } from '../src/services/menu/image-prioritizer.js';
import { parseImagePriorityRules } from '../src/config/pipeline.config.js';

const rules = parseImagePriorityRules('menu:0,gps-cs-s:1');

describe('image prioritizer', () => {
  it('ranks by the lowest matching rule and leaves others unmatched', () => {
    assert.equal(rankImage('https://img.example/menu/gps-cs-s/1.jpg', rules), 0);
    assert.equal(rankImage('https://img.example/gps-cs-s/2.jpg', rules), 1);
    assert.equal(rankImage('https://img.example/interior.jpg', rules), UNMATCHED_RANK);
  });

  it('puts the 3 menu URLs first out of 10, keeping their relative order', () => {
    const urls = Array.from({ length: 10 }, (_, i) => `https://img.example/photo-${i}.jpg`);
    urls[2] = 'https://img.example/menu-a.jpg';
    urls[5] = 'https://img.example/menu-b.jpg';
    urls[9] = 'https://img.example/menu-c.jpg';

    const ordered = prioritizeImages(urls, rules);

    assert.equal(ordered.length, 10);
    assert.deepEqual(ordered.slice(0, 3), [
      'https://img.example/menu-a.jpg',
      'https://img.example/menu-b.jpg',
      'https://img.example/menu-c.jpg'
    ]);
    assert.deepEqual(ordered.slice(3), [0, 1, 3, 4, 6, 7, 8].map(i => `https://img.example/photo-${i}.jpg`));
  });

  it('is idempotent', () => {
    const urls = [
      'https://img.example/a.jpg',
      'https://img.example/gps-cs-s/b.jpg',
      'https://img.example/menu/c.jpg',
      'https://img.example/d.jpg'
    ];
    const once = prioritizeImages(urls, rules);
    assert.deepEqual(prioritizeImages(once, rules), once);
    assert.deepEqual(once, [
      'https://img.example/menu/c.jpg',
      'https://img.example/gps-cs-s/b.jpg',
      'https://img.example/a.jpg',
      'https://img.example/d.jpg'
    ]);
  });

  it('drops exact duplicates and handles an empty list', () => {
    assert.deepEqual(prioritizeImages(['x', 'menu', 'x'], rules), ['menu', 'x']);
    assert.deepEqual(prioritizeImages([], rules), []);
  });
});
