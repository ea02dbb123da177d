// Settings and log level come from the environment; start every run from
// the defaults so the host shell cannot change test outcomes.
for (const name of Object.keys(process.env)) {
	if (name.startsWith("DVARA_")) delete process.env[name];
}
