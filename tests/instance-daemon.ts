import YAML from "yaml";
import { notFound, type FakeResponse } from "./fake-runner.js";

export interface FakeInstance {
  status: "Running" | "Stopped";
  config: Record<string, string>;
  devices: Record<string, Record<string, string>>;
  profiles: string[];
  description: string;
  snapshots: string[];
}

export function fakeInstance(overrides: Partial<FakeInstance> = {}): FakeInstance {
  return {
    status: "Stopped",
    config: {},
    devices: {},
    profiles: ["default"],
    description: "",
    snapshots: [],
    ...overrides
  };
}

function keyValues(pairs: string[]): Record<string, string> {
  const values: Record<string, string> = {};
  for (const pair of pairs) {
    const equals = pair.indexOf("=");
    if (equals > 0) values[pair.slice(0, equals)] = pair.slice(equals + 1);
  }
  return values;
}

/**
 * In-process stand-in for instances: `list`, `config` (keys and devices),
 * `copy`, `move`, `start`/`stop` and `snapshot`. Restores are recorded.
 */
export function createInstanceDaemon(initial: Record<string, FakeInstance> = {}) {
  const instances = new Map(Object.entries(initial));
  const restored: string[] = [];

  const listEntry = (name: string, instance: FakeInstance) => ({
    name,
    status: instance.status,
    config: instance.config,
    devices: instance.devices,
    profiles: instance.profiles,
    description: instance.description
  });

  const config = (args: string[]): FakeResponse => {
    const [verb = "", name = "", ...rest] = args;
    if (verb === "device") {
      const action = name;
      const [target = "", device = "", ...settings] = rest;
      const instance = instances.get(target);
      if (!instance) return notFound;
      switch (action) {
        case "add": {
          const [type = "", ...pairs] = settings;
          instance.devices[device] = { type, ...keyValues(pairs) };
          return undefined;
        }
        case "set":
          instance.devices[device] = { ...instance.devices[device], ...keyValues(settings) };
          return undefined;
        case "unset": {
          const existing = instance.devices[device];
          if (existing) delete existing[settings[0] ?? ""];
          return undefined;
        }
        case "remove":
          delete instance.devices[device];
          return undefined;
        default:
          return { exitCode: 1, stderr: "unexpected" };
      }
    }
    const instance = instances.get(name);
    if (!instance) return notFound;
    switch (verb) {
      case "show":
        return { stdout: YAML.stringify({ config: instance.config, devices: instance.devices }) };
      case "set":
        instance.config[rest[0] ?? ""] = rest[1] ?? "";
        return undefined;
      case "unset":
        delete instance.config[rest[0] ?? ""];
        return undefined;
      default:
        return { exitCode: 1, stderr: "unexpected" };
    }
  };

  const snapshot = (args: string[]): FakeResponse => {
    const [verb = "", name = "", snap = "", dest = ""] = args;
    const instance = instances.get(name);
    if (!instance) return notFound;
    const index = instance.snapshots.indexOf(snap);
    switch (verb) {
      case "show":
        return index >= 0 ? { stdout: YAML.stringify({ name: snap, stateful: false }) } : notFound;
      case "create":
        instance.snapshots.push(snap);
        return undefined;
      case "delete":
        if (index < 0) return notFound;
        instance.snapshots.splice(index, 1);
        return undefined;
      case "rename":
        if (index < 0) return notFound;
        instance.snapshots[index] = dest;
        return undefined;
      case "restore":
        restored.push(`${name}/${snap}`);
        return undefined;
      default:
        return { exitCode: 1, stderr: "unexpected" };
    }
  };

  const respond = (args: string[]): FakeResponse => {
    const [command = "", ...rest] = args;
    switch (command) {
      case "list": {
        const pattern = (rest[1] ?? "").replace(/^\^/, "").replace(/\$$/, "");
        const instance = instances.get(pattern);
        return { stdout: JSON.stringify(instance ? [listEntry(pattern, instance)] : []) };
      }
      case "config":
        return config(rest);
      case "snapshot":
        return snapshot(rest);
      case "copy":
      case "move": {
        const [source = "", dest = ""] = rest;
        const instance = instances.get(source);
        if (!instance) return notFound;
        if (command === "move") {
          instances.delete(source);
          instances.set(dest, instance);
        } else {
          instances.set(dest, { ...structuredClone(instance), status: "Stopped", snapshots: [] });
        }
        return undefined;
      }
      case "start":
      case "stop": {
        const instance = instances.get(rest[0] ?? "");
        if (!instance) return notFound;
        instance.status = command === "start" ? "Running" : "Stopped";
        return undefined;
      }
      default:
        return { exitCode: 1, stderr: "unexpected" };
    }
  };

  return { instances, restored, respond };
}
