import { generateFixtures } from "./fixtures/generate";
import { runPackingBenchmarks } from "./pack.bench";
import { runUnpackingBenchmarks } from "./unpack.bench";

async function main() {
	console.log("Starting benchmark run...");

	await generateFixtures();
	await runPackingBenchmarks();
	await runUnpackingBenchmarks();

	console.log("Benchmark run complete.");
}

main().catch((err) => {
	console.error("Benchmark failed:", err);
	process.exit(1);
});
