import { Money, RentInput } from "./dto";
import { InvalidParameterError } from "./errors";

/**
 * Normalize either rent input mode into a single monthly rent
 * Yield mode: annual rent = propertyValue * yield%, spread over 12 months
 */
export function resolveMonthlyRent(propertyValue: Money, input: RentInput): Money {
  switch (input.mode) {
    case "monthly":
      return input.monthlyRent;
    case "yield":
      if (!Number.isFinite(propertyValue) || propertyValue <= 0) {
        throw new InvalidParameterError(
          "propertyValue",
          propertyValue,
          "must be greater than 0 to derive rent from a yield"
        );
      }
      return (propertyValue * input.rentalYieldPercent) / 100 / 12;
  }
}
