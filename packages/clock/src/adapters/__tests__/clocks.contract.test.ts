import { describeClockContract } from "../../ports/__tests__/clock.contract"
import { FakeClock } from "../fake-clock"
import { SystemClock } from "../system-clock"

const harnesses = [
  { name: "SystemClock", make: () => new SystemClock() },
  { name: "FakeClock", make: () => new FakeClock(new Date("2024-03-01T12:00:00.000Z")) },
]

for (const harness of harnesses) {
  describeClockContract(harness)
}
