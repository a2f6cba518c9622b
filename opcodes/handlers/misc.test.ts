import { h_nop, h_show_status, h_verify, h_save, h_restore, h_restart } from "./misc";
import { UnsupportedOperationError } from "../../errors";
import { ZMachine } from "../../ZMachine";
import { ZBufferedDevice } from "../../ZBufferedDevice";
import { machineWith, op2, QUIT, sm, StoryBuilder } from "../test-utils";

describe("Misc Handlers", () => {
  it("h_nop should leave the machine as it was", () => {
    const { vm } = machineWith(QUIT);
    const pc = vm.pc;
    h_nop(vm);
    expect(vm.pc).toBe(pc);
    expect(vm.stack.depth()).toBe(0);
  });

  describe("h_show_status", () => {
    const status = (flags1: number) => {
      const { vm, device } = machineWith(QUIT, (b) =>
        b
          .setByte(0x01, flags1)
          .setObjects([{ name: "Kitchen" }])
          .setGlobal(0, 1)
          .setGlobal(1, 0xfffb)
          .setGlobal(2, 12),
      );
      h_show_status(vm);
      return device.statusLines;
    };

    it("should report location, score and moves", () => {
      expect(status(0)).toEqual([{ location: "Kitchen", kind: "score", score: -5, turns: 12 }]);
    });

    it("should report the time for time games", () => {
      expect(status(0x02)).toEqual([
        { location: "Kitchen", kind: "time", hours: 0xfffb, minutes: 12 },
      ]);
    });

    it("should leave the location blank for object 0", () => {
      const { vm, device } = machineWith(QUIT);
      h_show_status(vm);
      expect(device.statusLines).toEqual([{ location: "", kind: "score", score: 0, turns: 0 }]);
    });
  });

  describe("h_verify", () => {
    it("should branch true when the checksum matches", () => {
      const builder = new StoryBuilder();
      builder.addCode(QUIT);
      const vm = new ZMachine(builder.build({ withChecksum: true }), new ZBufferedDevice());
      const branch = jest.fn();
      h_verify(vm, [], { branch });
      expect(vm.header.checksum).not.toBe(0);
      expect(branch).toHaveBeenCalledWith(true);
    });

    it("should still branch true after the game writes to dynamic memory", async () => {
      // store G00 #7
      const builder = new StoryBuilder();
      builder.addCode([...op2(0x0d, sm(0x10), sm(7)), ...QUIT]);
      const vm = new ZMachine(builder.build({ withChecksum: true }), new ZBufferedDevice());
      await vm.step();
      expect(vm.stack.readVariable(0x10)).toBe(7);

      const branch = jest.fn();
      h_verify(vm, [], { branch });
      expect(branch).toHaveBeenCalledWith(true);
    });

    it("should branch false when it doesn't", () => {
      // the header checksum is 0 and the story isn't empty
      const { vm } = machineWith(QUIT);
      const branch = jest.fn();
      h_verify(vm, [], { branch });
      expect(branch).toHaveBeenCalledWith(false);
    });
  });

  describe("h_save / h_restore", () => {
    it("should report failure", () => {
      const { vm } = machineWith(QUIT);
      const branch = jest.fn();
      h_save(vm, [], { branch });
      h_restore(vm, [], { branch });
      expect(branch.mock.calls).toEqual([[false], [false]]);
    });
  });

  describe("h_restart", () => {
    it("should be unsupported", () => {
      const { vm } = machineWith(QUIT);
      expect(() => h_restart(vm)).toThrow(UnsupportedOperationError);
      expect(() => h_restart(vm)).toThrow("restart is not supported by this interpreter");
    });
  });
});
