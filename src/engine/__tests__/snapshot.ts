import test from 'ava'
import {Snapshot, type BaseImage} from '../snapshot.js'

const base: BaseImage = {ref: {name: 'archlinux', tag: 'latest'}, id: 'sha256:base'}

test('fromBase has no layers and points at the base image', t => {
  const snapshot = Snapshot.fromBase(base)
  t.is(snapshot.depth, 0)
  t.is(snapshot.top, 'sha256:base')
  t.deepEqual(snapshot.layers, [])
})

test('append returns a new snapshot and leaves the receiver untouched', t => {
  const s0 = Snapshot.fromBase(base)
  const s1 = s0.append({id: 'sha256:l1', index: 1, stepId: 'install'})

  t.not(s1, s0)
  t.is(s0.depth, 0)
  t.is(s0.top, 'sha256:base')
  t.is(s1.depth, 1)
  t.is(s1.top, 'sha256:l1')
})

test('layers keep step order and the top is the last one', t => {
  const snapshot = Snapshot.fromBase(base)
    .append({id: 'sha256:l1', index: 1, stepId: 'install'})
    .append({id: 'sha256:l2', index: 2, stepId: 'copy'})
    .append({id: 'sha256:l3', index: 3, stepId: 'build'})

  t.deepEqual(snapshot.layers.map(l => l.stepId), ['install', 'copy', 'build'])
  t.is(snapshot.top, 'sha256:l3')
})

test('append rejects a layer that does not follow the top', t => {
  const s0 = Snapshot.fromBase(base)
  t.throws(() => s0.append({id: 'sha256:l2', index: 2, stepId: 'copy'}), {instanceOf: RangeError})

  const s1 = s0.append({id: 'sha256:l1', index: 1, stepId: 'install'})
  t.throws(() => s1.append({id: 'sha256:lx', index: 1, stepId: 'again'}), {instanceOf: RangeError})
})

test('layers are frozen', t => {
  const snapshot = Snapshot.fromBase(base).append({id: 'sha256:l1', index: 1, stepId: 'install'})
  t.true(Object.isFrozen(snapshot.layers))
  t.true(Object.isFrozen(snapshot.layers[0]))
  t.true(Object.isFrozen(snapshot.base))
})

test('a layer passed to append is copied', t => {
  const layer = {id: 'sha256:l1', index: 1, stepId: 'install'}
  const snapshot = Snapshot.fromBase(base).append(layer)
  layer.id = 'sha256:changed'
  t.is(snapshot.top, 'sha256:l1')
})

test('equals compares base and layer ids', t => {
  const a = Snapshot.fromBase(base).append({id: 'sha256:l1', index: 1, stepId: 'install'})
  const b = Snapshot.fromBase(base).append({id: 'sha256:l1', index: 1, stepId: 'setup'})
  const c = Snapshot.fromBase(base).append({id: 'sha256:l9', index: 1, stepId: 'install'})

  t.true(a.equals(b))
  t.false(a.equals(c))
  t.false(a.equals(Snapshot.fromBase(base)))
})

test('toJSON lists the base reference and layers', t => {
  const snapshot = Snapshot.fromBase(base).append({id: 'sha256:l1', index: 1, stepId: 'install'})
  t.deepEqual(JSON.parse(JSON.stringify(snapshot)), {
    base: {image: 'archlinux:latest', id: 'sha256:base'},
    layers: [{id: 'sha256:l1', index: 1, stepId: 'install'}]
  })
})
