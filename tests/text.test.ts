import assert from 'node:assert/strict'
import { test } from 'node:test'
import {
  keywordOverlap,
  normalize,
  sequenceRatio,
  significantWords,
  subsequenceRatio,
  tokens,
  truncate,
} from '../src/ranking/text'

test('normalize lowercases and collapses whitespace', () => {
  assert.equal(normalize('  Add\n to   Cart '), 'add to cart')
  assert.equal(normalize(null), '')
  assert.equal(normalize(undefined), '')
})

test('tokens keep decimals whole and drop single characters', () => {
  assert.deepEqual(tokens('LG 5 Star (1.5) Split AC'), ['lg', 'star', '1.5', 'split', 'ac'])
  assert.deepEqual(tokens('tv TV tv'), ['tv'])
})

test('significantWords keeps words longer than two characters', () => {
  assert.deepEqual(significantWords('LG 5 Star (1.5) Split AC'), ['star', '1.5', 'split'])
})

test('keywordOverlap is the fraction of target tokens found', () => {
  assert.equal(keywordOverlap('split air conditioners', 'Split AC units'), 1 / 3)
  assert.equal(keywordOverlap('!', 'anything'), 0)
  assert.equal(keywordOverlap('Add to cart', 'add to cart now'), 1)
})

test('sequenceRatio counts characters in common blocks', () => {
  assert.equal(sequenceRatio('search', 'search products'), 12 / 21)
  assert.equal(sequenceRatio('', ''), 1)
  assert.equal(sequenceRatio('a', ''), 0)
  assert.equal(sequenceRatio('abc', 'abc'), 1)
})

test('subsequenceRatio follows character order', () => {
  assert.equal(subsequenceRatio('abc', 'cba'), 1 / 3)
  assert.equal(subsequenceRatio('abc', 'xaxbxc'), 1)
  assert.equal(subsequenceRatio('', 'abc'), 0)
})

test('truncate cuts at the limit', () => {
  assert.equal(truncate('abcdef', 3), 'abc')
  assert.equal(truncate('ab', 3), 'ab')
})
