import {access, readdir, writeFile, mkdir} from 'node:fs/promises'
import {join} from 'node:path'
import test from 'ava'
import {BuildStore, type BuildRecord} from '../build-store.js'
import {BuildNotFoundError, StoreError} from '../../errors.js'
import {createTmpDir} from '../../__tests__/helpers.js'

function record(buildId: string): BuildRecord {
  return {
    buildId,
    planId: 'dev-env',
    base: 'archlinux:latest',
    status: 'running',
    startedAt: '2026-01-01T00:00:00.000Z',
    layers: [],
    steps: []
  }
}

// -- open --------------------------------------------------------------------

test('open creates staging/ and builds/ directories', async t => {
  const root = await createTmpDir()
  await BuildStore.open(root)
  const entries = await readdir(root)
  t.true(entries.includes('staging'))
  t.true(entries.includes('builds'))
})

test('open is idempotent', async t => {
  const root = await createTmpDir()
  await BuildStore.open(root)
  const store = await BuildStore.open(root)
  t.is(store.root, root)
})

test('generateBuildId is timestamp-prefixed and unique', t => {
  const a = BuildStore.generateBuildId()
  const b = BuildStore.generateBuildId()
  t.regex(a, /^\d+-[\da-f]{8}$/)
  t.not(a, b)
})

// -- paths -------------------------------------------------------------------

test('step directories are named by position and id', async t => {
  const root = await createTmpDir()
  const store = await BuildStore.open(root)
  t.is(store.stepPath('b1', 1, 'install'), join(root, 'builds', 'b1', 'steps', '01-install'))
  t.is(store.stepStagingPath('b1', 12, 'build'), join(root, 'staging', 'b1', 'steps', '12-build'))
})

test('path helpers reject traversal', async t => {
  const store = await BuildStore.open(await createTmpDir())
  const error = t.throws<StoreError>(() => store.buildPath('../etc'))
  t.true(error instanceof StoreError)
  t.is(error?.code, 'INVALID_BUILD_ID')
  t.throws(() => store.stagingPath('a/b'), {instanceOf: StoreError})
})

test('prepareStep rejects an invalid step id', async t => {
  const store = await BuildStore.open(await createTmpDir())
  await store.prepareBuild('b1')
  await t.throwsAsync(async () => store.prepareStep('b1', 1, '../x'), {instanceOf: StoreError})
})

// -- lifecycle ---------------------------------------------------------------

test('prepareBuild creates staging/{buildId}/steps/', async t => {
  const root = await createTmpDir()
  const store = await BuildStore.open(root)
  const path = await store.prepareBuild('b1')
  t.is(path, join(root, 'staging', 'b1'))
  await t.notThrowsAsync(async () => access(join(path, 'steps')))
})

test('commitBuild moves the record to builds/', async t => {
  const root = await createTmpDir()
  const store = await BuildStore.open(root)
  await store.prepareBuild('b1')
  await store.writeRecord(record('b1'))
  await store.prepareStep('b1', 1, 'install')
  await store.commitBuild('b1')

  await t.throwsAsync(async () => access(store.stagingPath('b1')))
  await t.notThrowsAsync(async () => access(store.stepPath('b1', 1, 'install')))
  const stored = await store.readRecord('b1')
  t.is(stored.planId, 'dev-env')
})

test('cleanupStaging removes leftover staging directories', async t => {
  const root = await createTmpDir()
  const store = await BuildStore.open(root)
  await store.prepareBuild('crashed-1')
  await store.prepareBuild('crashed-2')
  await store.cleanupStaging()
  t.deepEqual(await readdir(join(root, 'staging')), [])
})

// -- queries -----------------------------------------------------------------

test('listBuilds returns committed builds sorted', async t => {
  const store = await BuildStore.open(await createTmpDir())
  for (const id of ['200-b', '100-a', '300-c']) {
    await store.prepareBuild(id)
    await store.commitBuild(id)
  }

  await store.prepareBuild('400-staging')
  t.deepEqual(await store.listBuilds(), ['100-a', '200-b', '300-c'])
})

test('readRecord throws BuildNotFoundError for an unknown build', async t => {
  const store = await BuildStore.open(await createTmpDir())
  const error = await t.throwsAsync(async () => store.readRecord('missing'))
  t.true(error instanceof BuildNotFoundError)
  t.is(error?.message, 'Build not found: missing')
})

test('readRecord ignores builds still in staging', async t => {
  const store = await BuildStore.open(await createTmpDir())
  await store.prepareBuild('b1')
  await store.writeRecord(record('b1'))
  await t.throwsAsync(async () => store.readRecord('b1'), {instanceOf: BuildNotFoundError})
})

test('removeBuild deletes a committed build', async t => {
  const root = await createTmpDir()
  const store = await BuildStore.open(root)
  await mkdir(join(root, 'builds', 'b1'))
  await writeFile(join(root, 'builds', 'b1', 'meta.json'), JSON.stringify(record('b1')), 'utf8')
  await store.removeBuild('b1')
  t.deepEqual(await store.listBuilds(), [])
})

test('removeBuild throws BuildNotFoundError for an unknown build', async t => {
  const store = await BuildStore.open(await createTmpDir())
  await t.throwsAsync(async () => store.removeBuild('missing'), {instanceOf: BuildNotFoundError})
})
