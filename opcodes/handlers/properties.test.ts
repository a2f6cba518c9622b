import {
  h_get_prop,
  h_get_prop_addr,
  h_get_prop_len,
  h_get_next_prop,
  h_put_prop,
} from "./properties";
import { InvalidPropertyError } from "../../errors";
import { machineWith, QUIT } from "../test-utils";

describe("Property Handlers", () => {
  const setup = () =>
    machineWith(QUIT, (b) =>
      b
        .setObjects([
          {
            name: "sword",
            properties: [
              { number: 18, data: [0x00, 0x2a] },
              { number: 6, data: [0x07] },
              { number: 4, data: [1, 2, 3, 4] },
            ],
          },
        ])
        .setPropertyDefault(10, 0x0505),
    );

  describe("h_get_prop", () => {
    it("should read word and byte properties", () => {
      const { vm } = setup();
      const store = jest.fn();
      h_get_prop(vm, [1, 18], { store });
      h_get_prop(vm, [1, 6], { store });
      expect(store.mock.calls).toEqual([[0x2a], [0x07]]);
    });

    it("should fall back to the default", () => {
      const { vm } = setup();
      const store = jest.fn();
      h_get_prop(vm, [1, 10], { store });
      expect(store).toHaveBeenCalledWith(0x0505);
    });

    it("should refuse properties longer than a word", () => {
      const { vm } = setup();
      expect(() => h_get_prop(vm, [1, 4], { store: jest.fn() })).toThrow(InvalidPropertyError);
    });
  });

  describe("h_get_prop_addr / h_get_prop_len", () => {
    it("should find the data and report its size", () => {
      const { vm, builder } = setup();
      const store = jest.fn();
      h_get_prop_addr(vm, [1, 4], { store });
      // name: length byte + 2 words; 18: 1 + 2; 6: 1 + 1; then 4's size byte
      const dataAddress = builder.propertyTables[0] + 5 + 3 + 2 + 1;
      expect(store).toHaveBeenLastCalledWith(dataAddress);

      h_get_prop_len(vm, [dataAddress], { store });
      expect(store).toHaveBeenLastCalledWith(4);
    });

    it("should give 0 for a missing property and for address 0", () => {
      const { vm } = setup();
      const store = jest.fn();
      h_get_prop_addr(vm, [1, 5], { store });
      h_get_prop_len(vm, [0], { store });
      expect(store.mock.calls).toEqual([[0], [0]]);
    });
  });

  describe("h_get_next_prop", () => {
    it("should walk the list in descending order", () => {
      const { vm } = setup();
      const store = jest.fn();
      h_get_next_prop(vm, [1, 0], { store });
      h_get_next_prop(vm, [1, 18], { store });
      h_get_next_prop(vm, [1, 6], { store });
      h_get_next_prop(vm, [1, 4], { store });
      expect(store.mock.calls).toEqual([[18], [6], [4], [0]]);
    });
  });

  describe("h_put_prop", () => {
    it("should write through the property's size", () => {
      const { vm } = setup();
      h_put_prop(vm, [1, 18, 0xbeef]);
      h_put_prop(vm, [1, 6, 0x1234]);
      expect(vm.objects.getProperty(1, 18)).toBe(0xbeef);
      expect(vm.objects.getProperty(1, 6)).toBe(0x34);
    });

    it("should refuse a missing property", () => {
      const { vm } = setup();
      expect(() => h_put_prop(vm, [1, 10, 1])).toThrow(InvalidPropertyError);
    });
  });
});
