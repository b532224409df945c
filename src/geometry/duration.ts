export class Duration {
	readonly seconds: number;

	constructor(seconds: number) {
		if (!Number.isFinite(seconds)) {
			throw new Error('Duration seconds must be a finite number');
		}
		if (seconds < 0) {
			throw new Error('Duration seconds must be >= 0');
		}
		this.seconds = Math.round(seconds);
	}

	static ofSeconds(seconds: number): Duration {
		return new Duration(seconds);
	}

	static fromMillis(milliseconds: number): Duration {
		if (!Number.isFinite(milliseconds)) {
			throw new Error('Duration milliseconds must be a finite number');
		}
		return new Duration(milliseconds / 1000);
	}

	toMillis(): number {
		return this.seconds * 1000;
	}

	toMinutes(): number {
		return this.seconds / 60;
	}

	isEqual(other: Duration): boolean {
		return this.seconds === other.seconds;
	}

	valueOf(): number {
		return this.seconds;
	}
}
