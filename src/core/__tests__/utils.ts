import test from 'ava'
import {formatDuration, sanitizeName, shellQuote, targetTriple} from '../utils.js'

test('formatDuration', t => {
  t.is(formatDuration(250), '250ms')
  t.is(formatDuration(1500), '1.5s')
  t.is(formatDuration(125_000), '2m 5s')
  t.is(formatDuration(3_900_000), '1h 5m')
})

test('sanitizeName keeps safe characters', t => {
  t.is(sanitizeName('util-linux_2.40.tar'), 'util-linux_2.40.tar')
  t.is(sanitizeName('a/b c'), 'a_b_c')
})

test('shellQuote leaves plain words alone', t => {
  t.is(shellQuote('/dev/sda2'), '/dev/sda2')
  t.is(shellQuote('KVER=6.1'), 'KVER=6.1')
})

test('shellQuote quotes everything else', t => {
  t.is(shellQuote('my host'), '\'my host\'')
  t.is(shellQuote('it\'s'), '\'it\'\\\'\'s\'')
  t.is(shellQuote(''), '\'\'')
  t.is(shellQuote('$HOME'), '\'$HOME\'')
})

test('targetTriple', t => {
  t.is(targetTriple('x86_64'), 'x86_64-rootstrap-linux-gnu')
})
