import { debug, disableDebug, processArgs, readGarden } from "./common";
import { groupByPlant, partitionGarden, totalFencePrice } from "./garden";

const flags = processArgs.filter((arg) => arg.startsWith("--"));
const [path = "in.txt"] = processArgs.filter((arg) => !arg.startsWith("--"));

if (flags.includes("--quiet")) {
  disableDebug();
}

const regions = partitionGarden(readGarden(path));

for (const [plant, group] of groupByPlant(regions)) {
  for (const region of group.regions) {
    const area = region.area();
    debug(
      `${plant} region: ${area} * ${region.perimeter()} = ` +
        `${region.price("perimeter")} ` +
        `(${region.numberOfSides()} sides = ${region.price("sides")})`
    );
  }
}

console.info(`Part One: ${totalFencePrice(regions, false)}`);
console.info(`Part Two: ${totalFencePrice(regions, true)}`);
