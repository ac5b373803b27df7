/**
 * Declares a handful of options, parses a fixed token stream and prints
 * the typed values.
 *
 * Run with: npx tsx examples/basic.ts
 */

import { ArgParser, Kind, dictOf, listOf } from '../src/index.js';

const LONG_HELP =
  'Length of the user in centimeters, measured from the top of the head down to the floor ' +
  'while standing upright without shoes on a level surface.';

function main(): void {
  const parser = new ArgParser('profile')
    .declare('length', { flag: 'l', kind: Kind.value, required: true, help: LONG_HELP })
    .declare('weight', { flag: 'w', kind: Kind.value, required: true, help: 'Weight of the user in kilograms' })
    .declare('name', { flag: 'n', kind: Kind.value, required: true, help: 'Name of the user' })
    .declare('frequencies', { flag: 'f', kind: Kind.multi, help: "User's favorite frequencies" })
    .declare('admin', { flag: 'a', kind: Kind.switch, default: 'false', help: 'Whether the user is an admin' })
    .declare('socks', { flag: 's', kind: Kind.keyValue, help: 'Whether socks are worn on a given day' });

  const tokens = './profile -l -60 -w -6001.45e-2 -n Ada -a -f 1 2 3 4 5 -s Monday:true Friday:false'.split(' ');
  const outcome = parser.parse(tokens);

  console.log('length:', outcome.get('length', 'integer'));
  console.log('weight:', outcome.get('weight', 'number'));
  console.log('name:', outcome.get('name'));
  console.log('admin:', outcome.get('admin', 'boolean'));
  console.log('frequencies:', outcome.getWith('frequencies', listOf('integer')));
  console.log('socks:', outcome.getWith('socks', dictOf('string', 'boolean')));

  console.log('');
  console.log(parser.help());
}

main();
