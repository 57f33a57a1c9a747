import {join} from 'node:path'
import {writeFile} from 'node:fs/promises'
import test from 'ava'
import {loadConfig} from '../config.js'
import {ValidationError} from '../../errors.js'
import {createTmpDir} from '../../__tests__/helpers.js'

test('loadConfig returns {} when no .stratum.yml', async t => {
  t.deepEqual(await loadConfig(await createTmpDir()), {})
})

test('loadConfig returns {} for empty file', async t => {
  const dir = await createTmpDir()
  await writeFile(join(dir, '.stratum.yml'), '', 'utf8')
  t.deepEqual(await loadConfig(dir), {})
})

test('loadConfig reads workdir, pull and file', async t => {
  const dir = await createTmpDir()
  await writeFile(join(dir, '.stratum.yml'), 'workdir: .cache/stratum\npull: false\nfile: images/dev.yml\n', 'utf8')
  t.deepEqual(await loadConfig(dir), {workdir: '.cache/stratum', pull: false, file: 'images/dev.yml'})
})

test('loadConfig ignores unknown keys', async t => {
  const dir = await createTmpDir()
  await writeFile(join(dir, '.stratum.yml'), 'pull: true\ncolor: blue\n', 'utf8')
  t.deepEqual(await loadConfig(dir), {pull: true})
})

test('loadConfig rejects values of the wrong type', async t => {
  const dir = await createTmpDir()
  await writeFile(join(dir, '.stratum.yml'), 'pull: sometimes\n', 'utf8')
  const error = await t.throwsAsync(async () => loadConfig(dir), {instanceOf: ValidationError})
  t.is(error?.message, '.stratum.yml: pull must be a boolean')
})

test('loadConfig rejects a non-mapping document', async t => {
  const dir = await createTmpDir()
  await writeFile(join(dir, '.stratum.yml'), '- workdir\n', 'utf8')
  await t.throwsAsync(async () => loadConfig(dir), {instanceOf: ValidationError})
})

test('loadConfig throws on invalid YAML', async t => {
  const dir = await createTmpDir()
  await writeFile(join(dir, '.stratum.yml'), ':\n  - :\n    bad: [', 'utf8')
  await t.throwsAsync(async () => loadConfig(dir))
})
