export default { genesis: () => undefined };
