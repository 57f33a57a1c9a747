import process from 'node:process'
import {mkdir, writeFile} from 'node:fs/promises'
import {join} from 'node:path'
import test from 'ava'
import {resolveBuildFile, resolveWorkdir} from '../utils.js'
import {describeStep} from '../commands/plan.js'
import {createTmpDir} from '../../__tests__/helpers.js'

// -- resolveBuildFile --------------------------------------------------------

test('resolveBuildFile: resolves stratum.yml in directory', async t => {
  const dir = await createTmpDir()
  await writeFile(join(dir, 'stratum.yml'), 'from: archlinux')
  t.is(await resolveBuildFile(dir), join(dir, 'stratum.yml'))
})

test('resolveBuildFile: prefers stratum.yml over stratum.json', async t => {
  const dir = await createTmpDir()
  await writeFile(join(dir, 'stratum.json'), '{"from":"archlinux"}')
  await writeFile(join(dir, 'stratum.yml'), 'from: archlinux')
  t.is(await resolveBuildFile(dir), join(dir, 'stratum.yml'))
})

test('resolveBuildFile: resolves stratum.json in directory', async t => {
  const dir = await createTmpDir()
  await writeFile(join(dir, 'stratum.json'), '{"from":"archlinux"}')
  t.is(await resolveBuildFile(dir), join(dir, 'stratum.json'))
})

test('resolveBuildFile: returns a file path as is', async t => {
  const dir = await createTmpDir()
  const file = join(dir, 'dev.yaml')
  await writeFile(file, 'from: archlinux')
  t.is(await resolveBuildFile(file), file)
})

test('resolveBuildFile: throws when the directory has no build file', async t => {
  const dir = await createTmpDir()
  await mkdir(join(dir, 'empty'))
  const error = await t.throwsAsync(async () => resolveBuildFile(join(dir, 'empty')))
  t.is(error?.message, `No build file found in ${join(dir, 'empty')}. Expected one of: stratum.yml, stratum.yaml, stratum.json`)
})

test('resolveBuildFile: throws when the path does not exist', async t => {
  const dir = await createTmpDir()
  const error = await t.throwsAsync(async () => resolveBuildFile(join(dir, 'missing')))
  t.is(error?.message, `Path does not exist: ${join(dir, 'missing')}`)
})

// -- resolveWorkdir ----------------------------------------------------------

test.serial('resolveWorkdir: --workdir wins', t => {
  process.env.STRATUM_WORKDIR = '/from-env'
  try {
    t.is(resolveWorkdir({workdir: 'records'}, {workdir: 'from-config'}, '/project'), '/project/records')
  } finally {
    delete process.env.STRATUM_WORKDIR
  }
})

test.serial('resolveWorkdir: environment comes before config', t => {
  process.env.STRATUM_WORKDIR = '/from-env'
  try {
    t.is(resolveWorkdir({}, {workdir: 'from-config'}, '/project'), '/from-env')
  } finally {
    delete process.env.STRATUM_WORKDIR
  }
})

test.serial('resolveWorkdir: config, then the default', t => {
  delete process.env.STRATUM_WORKDIR
  t.is(resolveWorkdir({}, {workdir: 'from-config'}, '/project'), '/project/from-config')
  t.is(resolveWorkdir({}, {}, '/project'), '/project/.stratum')
})

// -- describeStep ------------------------------------------------------------

test('describeStep: run and copy steps', t => {
  t.is(describeStep({kind: 'run', id: 'build', workdir: '/app', cmd: ['make', '-j4'], env: {}, network: 'bridge'}), 'RUN make -j4')
  t.is(describeStep({kind: 'copy', id: 'copy', workdir: '/app', source: '/project/src', destination: '/app', intoDirectory: false}), 'COPY /project/src → /app')
})
