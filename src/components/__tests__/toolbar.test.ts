import { beforeEach, describe, expect, it, vi } from "vitest";

import type { PillbarLogger } from "../../logger.ts";
import type { BarEvent } from "../bar.ts";
import type { ToolbarProps } from "../toolbar.ts";

import { FakeNativeHost, flushPromises } from "../../__tests__/fake-host.ts";
import { silentLogger } from "../../__tests__/fixtures.ts";
import { action, fixedSpace } from "../../layout/normalize.ts";
import { Toolbar } from "../toolbar.ts";

let host: FakeNativeHost;
let logger: PillbarLogger;
let onGear: ReturnType<typeof vi.fn>;
let props: ToolbarProps;

beforeEach(() => {
  host = new FakeNativeHost();
  logger = silentLogger();
  onGear = vi.fn();
  props = {
    leading: [action({ label: "Edit" }), fixedSpace(20), action({ label: "Share" })],
    trailing: [action({ iconRef: "gear", onPressed: onGear })],
  };
});

function mount(initial: ToolbarProps = props, viewId = 7): Toolbar {
  const toolbar = new Toolbar(initial, { bridge: host.bridge, logger });
  toolbar.attach(viewId);
  return toolbar;
}

describe("Toolbar", () => {
  it("builds the construction payload", () => {
    const toolbar = new Toolbar(props, { bridge: host.bridge, logger });

    expect(toolbar.creationParams).toMatchObject({
      title: "",
      leadingLabels: ["Edit", "", "Share"],
      leadingPaddings: [0, 20, 0],
      leadingSpacers: ["", "fixed", ""],
      middleIcons: [],
      trailingIcons: ["gear"],
      trailingLabels: [""],
      middleAlignment: "center",
      pillHeight: null,
      transparent: false,
      isDark: false,
      tint: null,
    });
    expect(toolbar.creationParams["layout"]).toEqual(toolbar.plan);
  });

  it("plans one pill for Edit and Share with the gap split evenly", () => {
    const toolbar = new Toolbar(props, { bridge: host.bridge, logger });
    const [pill, gap] = toolbar.plan.leading;

    expect(pill).toMatchObject({
      type: "group",
      section: "leading",
      tags: [0, 2],
      geometry: { buttons: [{ slot: 0, width: 46 }, { slot: 2, width: 46 }] },
    });
    expect(gap).toEqual({ type: "spacer", spacer: "flexible" });
    expect(toolbar.plan.trailing).toMatchObject([{ tags: [2000] }]);
  });

  it("attaches without sending updates and asks for its size", () => {
    const toolbar = mount();

    expect(toolbar.state).toBe("created");
    expect(toolbar.viewType).toBe("PillbarToolbar");
    expect(host.sent).toEqual([]);
    expect(host.calls).toHaveLength(1);
    expect(host.calls[0]).toMatchObject({ namespace: "PillbarToolbar_7", method: "getIntrinsicSize" });
  });

  it("sends nothing before attach", () => {
    const toolbar = new Toolbar(props, { bridge: host.bridge, logger });
    expect(toolbar.update({ ...props, tint: "#ff0000" })).toEqual([]);
    expect(host.sent).toEqual([]);
  });

  it("sends only setStyle when the tint changes", () => {
    const toolbar = mount();
    toolbar.update({ ...props, tint: "#ff0000" });

    expect(host.methods()).toEqual(["setStyle"]);
    expect(host.lastArgs("setStyle")).toEqual({ tint: 0xffff0000 });
    expect(toolbar.state).toBe("synced");
  });

  it("sends nothing for an unchanged rebuild", () => {
    const toolbar = mount();
    toolbar.update({ ...props, tint: 0xff112233 });
    host.clear();

    expect(toolbar.update({ ...props, tint: 0xff112233 })).toEqual([]);
    expect(host.sent).toEqual([]);
  });

  it("attaches the layout plan to setItems", () => {
    const toolbar = mount();
    const next = { ...props, trailing: [action({ label: "Done" })] };
    toolbar.update(next);

    expect(host.methods()).toEqual(["setItems"]);
    expect(host.lastArgs("setItems")).toMatchObject({
      trailingIcons: [""],
      trailingLabels: ["Done"],
      layout: toolbar.plan,
    });
  });

  it("sends alignment changes in setLayout", () => {
    const toolbar = mount({ ...props, middle: [action({ label: "Title" })] });
    toolbar.update({ ...props, middle: [action({ label: "Title" })], middleAlignment: "leading" });

    expect(host.methods()).toEqual(["setLayout"]);
    expect(host.lastArgs("setLayout")).toEqual({
      middleAlignment: "leading",
      pillHeight: null,
      layout: toolbar.plan,
    });
    expect(toolbar.plan.alignment).toBe("leading");
  });

  it("sends brightness changes", () => {
    const toolbar = mount();
    toolbar.setBrightness(true);
    toolbar.setBrightness(true);
    expect(host.methods()).toEqual(["setBrightness"]);
    expect(host.lastArgs("setBrightness")).toEqual({ isDark: true });
  });

  it("uses the theme colour when no tint is set", () => {
    const toolbar = new Toolbar(props, {
      bridge: host.bridge,
      logger,
      theme: { primaryColor: 0xff00ff00, isDark: true },
    });
    expect(toolbar.creationParams).toMatchObject({ tint: 0xff00ff00, isDark: true });
  });

  it("routes a raw tag to the tapped item", () => {
    const toolbar = mount();
    const events: BarEvent[] = [];
    toolbar.on((event) => events.push(event));

    host.emit("PillbarToolbar_7", "controlTapped", { tag: 2000 });

    expect(onGear).toHaveBeenCalledTimes(1);
    expect(events).toEqual([{ type: "trailingTapped", index: 0 }]);
  });

  it("routes a section tap to the tapped item", () => {
    const onShare = vi.fn();
    const toolbar = mount({
      ...props,
      leading: [action({ label: "Edit" }), fixedSpace(20), action({ label: "Share", onPressed: onShare })],
    });
    const listener = vi.fn();
    toolbar.on(listener);

    host.emit("PillbarToolbar_7", "leadingTapped", { index: 2 });

    expect(onShare).toHaveBeenCalledTimes(1);
    expect(listener).toHaveBeenCalledWith({ type: "leadingTapped", index: 2 });
  });

  it("ignores taps on spacers, stale indexes and malformed payloads", () => {
    const toolbar = mount();
    const listener = vi.fn();
    toolbar.on(listener);

    host.emit("PillbarToolbar_7", "leadingTapped", { index: 1 });
    host.emit("PillbarToolbar_7", "trailingTapped", { index: 4 });
    host.emit("PillbarToolbar_7", "trailingTapped", { position: 0 });
    host.emit("PillbarToolbar_7", "controlTapped", { tag: 9000 });
    host.emit("PillbarToolbar_7", "somethingElse", null);

    expect(listener).not.toHaveBeenCalled();
    expect(onGear).not.toHaveBeenCalled();
  });

  it("stops listening after unsubscribe", () => {
    const toolbar = mount();
    const listener = vi.fn();
    const unsubscribe = toolbar.on(listener);
    unsubscribe();

    host.emit("PillbarToolbar_7", "trailingTapped", { index: 0 });
    expect(listener).not.toHaveBeenCalled();
    expect(onGear).toHaveBeenCalledTimes(1);
  });

  it("drops items past the section capacity with one warning", () => {
    const toolbar = new Toolbar(
      { leading: [action({ label: "A" }), action({ label: "B" }), action({ label: "C" })] },
      { bridge: host.bridge, logger, config: { sectionCapacity: 2 } },
    );

    expect(toolbar.creationParams["leadingLabels"]).toEqual(["A", "B"]);
    expect(toolbar.plan.leading).toMatchObject([{ tags: [0, 1] }]);
    expect(logger.warnOnce).toHaveBeenCalledWith(
      "PillbarToolbar: leading has 3 items; only the first 2 are rendered",
    );
  });

  it("applies the pill height override", () => {
    const toolbar = new Toolbar({ ...props, pillHeight: 30 }, { bridge: host.bridge, logger });
    expect(toolbar.creationParams["pillHeight"]).toBe(30);
    expect(toolbar.plan.trailing).toMatchObject([{ geometry: { height: 30, cornerRadius: 15 } }]);
  });
});

describe("Toolbar lifecycle", () => {
  it("reports the intrinsic size once native answers", async () => {
    host.replies.set("getIntrinsicSize", { height: 50, width: 390 });
    const onLayout = vi.fn();
    const toolbar = new Toolbar(props, { bridge: host.bridge, logger, onLayout });

    expect(toolbar.size).toEqual({ height: 44, width: null });
    toolbar.attach(1);
    await flushPromises();

    expect(toolbar.size).toEqual({ height: 50, width: 390 });
    expect(onLayout).toHaveBeenCalledWith({ height: 50, width: 390 });
  });

  it("measures only once", async () => {
    host.replies.set("getIntrinsicSize", { height: 50 });
    const toolbar = mount();
    await flushPromises();
    toolbar.update({ ...props, trailing: [] });

    expect(host.calls).toHaveLength(1);
  });

  it("skips measurement with a fixed height", () => {
    const toolbar = mount({ ...props, height: 60 });
    expect(host.calls).toEqual([]);
    expect(toolbar.size).toEqual({ height: 60, width: null });
  });

  it("ignores a size reply that arrives after dispose", async () => {
    let resolve: (value: unknown) => void = () => {};
    host.handlers.set(
      "getIntrinsicSize",
      () =>
        new Promise((r) => {
          resolve = r;
        }),
    );
    const onLayout = vi.fn();
    const toolbar = new Toolbar(props, { bridge: host.bridge, logger, onLayout });
    toolbar.attach(1);
    toolbar.dispose();
    resolve({ height: 80, width: 100 });
    await flushPromises();

    expect(onLayout).not.toHaveBeenCalled();
    expect(toolbar.size.height).toBe(44);
  });

  it("stops syncing and dispatching after dispose", () => {
    const toolbar = mount();
    const listener = vi.fn();
    toolbar.on(listener);
    toolbar.dispose();

    expect(toolbar.state).toBe("disposed");
    expect(toolbar.snapshot).toBeNull();
    expect(toolbar.update({ ...props, tint: "#000" })).toEqual([]);
    host.emit("PillbarToolbar_7", "trailingTapped", { index: 0 });

    expect(host.sent).toEqual([]);
    expect(listener).not.toHaveBeenCalled();
    expect(onGear).not.toHaveBeenCalled();
  });

  it("sends changes made between construction and attach", () => {
    const toolbar = new Toolbar({ ...props, tint: "#ff0000" }, { bridge: host.bridge, logger });
    expect(toolbar.creationParams["tint"]).toBe(0xffff0000);

    expect(toolbar.update({ ...props, tint: "#0000ff" })).toEqual([]);
    toolbar.attach(1);
    toolbar.update({ ...props, tint: "#0000ff" });

    expect(host.methods()).toEqual(["setStyle"]);
    expect(host.lastArgs("setStyle")).toEqual({ tint: 0xff0000ff });
  });

  it("seeds from current props when the payload was never read", () => {
    const toolbar = new Toolbar({ ...props, tint: "#ff0000" }, { bridge: host.bridge, logger });
    toolbar.attach(1);
    expect(toolbar.update({ ...props, tint: "#ff0000" })).toEqual([]);
    expect(toolbar.snapshot?.tint).toBe(0xffff0000);
  });

  it("syncs with its default logger outside Node", () => {
    vi.spyOn(console, "debug").mockImplementation(() => undefined);
    host.replies.set("getIntrinsicSize", { height: 44 });
    const toolbar = new Toolbar(props, { bridge: host.bridge, config: { logLevel: "debug" } });
    toolbar.attach(1);

    vi.stubGlobal("process", undefined);
    try {
      toolbar.update({ ...props, tint: "#ff0000" });
    } finally {
      vi.unstubAllGlobals();
      vi.restoreAllMocks();
    }

    expect(host.methods()).toEqual(["setStyle"]);
  });

  it("ignores a second attach", () => {
    const toolbar = mount();
    toolbar.attach(8);
    expect(host.calls).toHaveLength(1);
    host.emit("PillbarToolbar_8", "trailingTapped", { index: 0 });
    expect(onGear).not.toHaveBeenCalled();
  });
});
