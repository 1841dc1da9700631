import fs from 'fs';
import path from 'path';

const OUTPUT_DIRECTORY = path.join(process.cwd(), 'scripts', 'output');

export function writeOutputFile(
  fileName: string,
  fileContent: object,
  space?: string | number,
): string {
  const fullPath = path.join(OUTPUT_DIRECTORY, fileName);
  fs.mkdirSync(path.dirname(fullPath), { recursive: true });

  fs.writeFileSync(
    fullPath,
    JSON.stringify(fileContent, undefined, space),
    { encoding: 'utf8', flag: 'w' },
  );
  return fullPath;
}
