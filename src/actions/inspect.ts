import { padStart } from 'lodash';
import minimist from 'minimist';
import { parseBIF6 } from '../decoder/iterator';
import { DecodeOptions } from '../decoder/stream';
import { BIF6FormatError, BIF6IOError, describeError } from '../errors';
import { IntervalImage } from '../models/bif6';
import { formatMz } from '../utils';
import { decodeOptions } from './options';

export function formatInterval(interval: IntervalImage): string {
  const band = `${formatMz(interval.mzLower)} .. ${formatMz(interval.mzUpper)} (mid ${formatMz(interval.mzMiddle)})`;
  const tic = IntervalImage.isTicImage(interval) ? '  [TIC]' : '';
  return `${padStart(interval.id.toString(), 6)}  m/z ${band}  total ${IntervalImage.total(interval)}${tic}`;
}

function inspect(file: string, options: DecodeOptions) {
  const intervals = parseBIF6(file, options);
  const { header } = intervals;
  console.log(`${file}: ${header.intervalCount} intervals, ${header.width}x${header.height} pixels`);

  let count = 0;
  for (const interval of intervals) {
    console.log(formatInterval(interval));
    count++;
  }

  if (count !== header.intervalCount)
    console.log(`warning: header declares ${header.intervalCount} intervals, file holds ${count}`);
}

export async function main(args: string[]) {
  const parsedArgs = minimist(args, {
    boolean: ['help'],
    string: ['max-dimension'],
  });

  if (parsedArgs._.length !== 1 || parsedArgs.help) {
    console.log('usage: bif6-tools inspect <bif6 file> [--max-dimension N]');
    return Boolean(parsedArgs.help);
  }

  const options = decodeOptions(parsedArgs['max-dimension']);
  if (!options)
    return false;

  try {
    inspect(parsedArgs._[0], options);
  } catch (err) {
    if (err instanceof BIF6FormatError || err instanceof BIF6IOError) {
      console.error(`${parsedArgs._[0]}: ${describeError(err)}`);
      return false;
    }
    throw err;
  }
  return true;
}
