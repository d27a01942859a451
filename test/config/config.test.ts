import { expect } from "chai";

import { getConfig } from "../../config/config";
import { isValidAddress } from "../../utils/address";
import { expectRevert } from "../utils/revert";

describe("Config", () => {
  for (const network of ["localhost", "avalanche_mainnet"]) {
    it(`should only hold valid addresses for ${network}`, async () => {
      const config = await getConfig(network);
      const { nebulas } = config.nebulaRegistry;

      expect(nebulas.length).to.be.greaterThan(0);
      expect(isValidAddress(config.walletAddresses.governanceMultisig)).to.equal(
        true,
      );
      expect(isValidAddress(config.nebulaRegistry.address)).to.equal(true);

      for (const nebula of nebulas) {
        expect(isValidAddress(nebula.address)).to.equal(true);
        expect(isValidAddress(nebula.denominationToken)).to.equal(true);
        expect(isValidAddress(nebula.denominationFeed)).to.equal(true);

        for (const { lpToken, priceFeeds } of nebula.liquidityTokens) {
          expect(isValidAddress(lpToken)).to.equal(true);
          expect(priceFeeds.every(isValidAddress)).to.equal(true);
        }
      }
    });
  }

  it("should reject an unknown network", async () => {
    const error = await expectRevert(getConfig("mainnet"), Error);
    expect(error.message).to.equal("Unknown network: mainnet");
  });
});
