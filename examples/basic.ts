import {
  bipipe,
  fromHandle,
  fromIterable,
  map,
  pipe,
  runEffect,
  scan,
  stdoutLn,
  sum,
  consumeWith,
  zipWith,
  toListM,
} from '../src/index';

async function basicExample() {
  console.log('bipipe basic examples\n');

  // Example 1: Simple transformation pipeline
  console.log('1. Simple Pipeline:');
  const result1 = await bipipe
    .range(1, 10)
    .map((x) => x * 2)
    .filter((x) => x > 10)
    .take(3)
    .toArray();
  console.log('Result:', result1); // [12, 14, 16]

  // Example 2: Fork a flow and fold each side
  console.log('\n2. Fork:');
  const [evens, odds] = bipipe.range(1, 10).fork((x) => x % 2 === 0);
  console.log('Sum of evens:', await evens.fold((acc: number, x) => acc + x, 0, (acc) => acc)); // 20
  console.log('Sum of odds:', await odds.fold((acc: number, x) => acc + x, 0, (acc) => acc)); // 25

  // Example 3: Running totals with the plain combinators
  console.log('\n3. Running totals:');
  const totals = pipe(fromIterable([3, 1, 4, 1, 5]), scan((acc: number, x: number) => acc + x, 0, (acc) => acc));
  console.log('Totals:', await toListM(totals)); // [0, 3, 4, 8, 9, 14]
  console.log('Sum:', await sum(fromIterable([3, 1, 4, 1, 5]))); // 14

  // Example 4: Tee values into a side sink
  console.log('\n4. Tee:');
  const audit: string[] = [];
  const audited = await bipipe
    .of('a', 'b', 'c')
    .tee(consumeWith((value: string) => {
      audit.push(value);
    }))
    .map((value) => value.toUpperCase())
    .toArray();
  console.log('Downstream:', audited, 'audit:', audit);

  // Example 5: Pairing two sources
  console.log('\n5. zipWith:');
  const pairs = zipWith((a: number, b: string) => `${b}${a}`, fromIterable([1, 2, 3]), fromIterable(['x', 'y']));
  console.log('Pairs:', await toListM(pairs)); // ['x1', 'y2']
}

// Numbers every line of stdin: `echo -e "a\nb" | tsx examples/basic.ts --cat`
async function numberLines() {
  let line = 0;
  const numbered = pipe(fromHandle(process.stdin), map((text: string) => `${++line}\t${text}`));
  await runEffect(pipe(numbered, stdoutLn()));
}

const main = process.argv.includes('--cat') ? numberLines : basicExample;

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
