export default { group: "", name: "nameless group", fn: () => undefined };
