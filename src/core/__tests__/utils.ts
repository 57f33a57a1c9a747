import test from 'ava'
import {formatDuration, shortId} from '../utils.js'

test('formatDuration: milliseconds below one second', t => {
  t.is(formatDuration(0), '0ms')
  t.is(formatDuration(999), '999ms')
})

test('formatDuration: seconds with one decimal', t => {
  t.is(formatDuration(1000), '1.0s')
  t.is(formatDuration(12_345), '12.3s')
})

test('formatDuration: minutes and seconds', t => {
  t.is(formatDuration(60_000), '1m 0s')
  t.is(formatDuration(135_000), '2m 15s')
})

test('formatDuration: never prints 60 seconds', t => {
  t.is(formatDuration(59_949), '59.9s')
  t.is(formatDuration(59_999), '1m 0s')
  t.is(formatDuration(119_600), '2m 0s')
})

test('shortId strips the digest algorithm and keeps 12 digits', t => {
  t.is(shortId('sha256:4f1c2a9b8e7d6c5b4a3f2e1d0c9b8a7f'), '4f1c2a9b8e7d')
})

test('shortId leaves short ids intact', t => {
  t.is(shortId('sha256:base'), 'base')
  t.is(shortId('abc'), 'abc')
})
