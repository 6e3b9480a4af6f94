import { bench, describe } from "vitest";
import { Binomial } from "../src/distribution/binomial.js";
import { silentLogger } from "../src/lib/logger/index.js";

describe("binomial pmf", () => {
	const logger = silentLogger();
	const small = new Binomial(20, 0.3, { logger });
	const large = new Binomial(400, 0.3, { logger });

	bench("construct n=100", () => {
		new Binomial(100, 0.3, { logger });
	});

	bench("probabilityK n=20 100x", () => {
		for (let i = 0; i < 100; i++) {
			small.probabilityK(i % 21);
		}
	});

	bench("cumulative n=400", () => {
		large.cumulative(200);
	});

	bench("probabilityExact n=400", () => {
		large.probabilityExact(120);
	});
});
