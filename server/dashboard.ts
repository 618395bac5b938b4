import type { DisplayPayload } from "../lib/display";

export type DashboardPage = {
	payload: DisplayPayload;
	configWarning: string | null;
};

/** JSON safe to inline inside a `<script>` element. */
export const inlineJson = (value: unknown) =>
	JSON.stringify(value)
		.replace(/</g, "\\u003c")
		.replace(/\u2028/g, "\\u2028")
		.replace(/\u2029/g, "\\u2029");

const STYLE = `
	body { font-family: system-ui, -apple-system, "Segoe UI", Roboto, sans-serif; max-width: 760px; margin: 2rem auto; padding: 0 1rem; }
	.row { display: flex; align-items: center; justify-content: space-between; padding: 10px 14px; border-radius: 8px; margin: 8px 0; background: rgba(0,0,0,0.03); }
	.name { font-weight: 700; font-size: 18px; }
	.value { font-family: ui-monospace, SFMono-Regular, Menlo, monospace; font-size: 24px; min-width: 220px; text-align: right; }
	.warning { background: #fff4ce; padding: 8px 12px; border-radius: 6px; }
	.ok { color: #1a7f37; }
	.error { color: #cf222e; }
	form { display: flex; gap: 8px; flex-wrap: wrap; margin: 8px 0; }
	table { width: 100%; border-collapse: collapse; }
	td, th { text-align: left; padding: 4px 6px; border-bottom: 1px solid #eee; }
`;

// Re-projects locally on a timer; only the user's own mutations refetch state.
const CLIENT_SCRIPT = `
(function () {
	var payload = JSON.parse(document.getElementById("payload").textContent);
	var container = document.getElementById("entries");
	var status = document.getElementById("status");
	var timer = null;
	var started = 0;

	function format(value, decimals) {
		var fixed = value.toFixed(decimals);
		return Number(fixed) === 0 ? (0).toFixed(decimals) : fixed;
	}

	function render() {
		container.textContent = "";
		var selects = document.querySelectorAll("select[data-entries]");
		selects.forEach(function (select) { select.textContent = ""; });
		payload.entries.forEach(function (entry, index) {
			var row = document.createElement("div");
			row.className = "row";
			var name = document.createElement("div");
			name.className = "name";
			name.textContent = entry.name;
			var value = document.createElement("div");
			value.className = "value";
			value.id = "value-" + index;
			row.appendChild(name);
			row.appendChild(value);
			container.appendChild(row);
			selects.forEach(function (select) {
				var option = document.createElement("option");
				option.value = String(index);
				option.textContent = entry.name;
				select.appendChild(option);
			});
		});
		document.getElementById("baseline").textContent =
			new Date(payload.baselineTimestamp).toISOString();
		started = performance.now();
		tick();
		if (timer) clearInterval(timer);
		timer = setInterval(tick, payload.intervalMs);
	}

	function tick() {
		var elapsed = (performance.now() - started) / 1000;
		payload.entries.forEach(function (entry, index) {
			var el = document.getElementById("value-" + index);
			if (el) el.textContent = format(entry.valueAtRender + entry.rate * elapsed, payload.decimals);
		});
	}

	function showWarning(warning) {
		var el = document.getElementById("config-warning");
		el.hidden = !warning;
		el.textContent = warning ? "Config warning: " + warning : "";
	}

	function show(outcome) {
		status.className = outcome.ok ? "ok" : "error";
		status.textContent = outcome.message;
	}

	function refresh() {
		return fetch("/api/state").then(function (res) { return res.json(); }).then(function (next) {
			payload = next;
			render();
			return loadLog();
		});
	}

	function loadLog() {
		return fetch("/api/transactions?limit=20").then(function (res) { return res.json(); }).then(function (body) {
			var tbody = document.getElementById("log");
			tbody.textContent = "";
			body.transactions.forEach(function (tx) {
				var tr = document.createElement("tr");
				[tx.txId, new Date(tx.timestamp).toISOString(), tx.entryName, tx.deltaAmount, tx.note, tx.actor].forEach(function (cell) {
					var td = document.createElement("td");
					td.textContent = String(cell);
					tr.appendChild(td);
				});
				tbody.appendChild(tr);
			});
		});
	}

	function send(method, url, body, button) {
		button.disabled = true;
		return fetch(url, {
			method: method,
			headers: { "content-type": "application/json" },
			body: body === undefined ? undefined : JSON.stringify(body),
		})
			.then(function (res) { return res.json(); })
			.then(function (outcome) {
				show(outcome);
				return outcome.ok ? refresh().then(function () { return true; }) : false;
			})
			.catch(function (error) { show({ ok: false, message: String(error) }); return false; })
			.finally(function () { button.disabled = false; });
	}

	function selected(form) {
		var index = Number(form.elements.index.value);
		return { index: index, name: payload.entries[index] ? payload.entries[index].name : undefined };
	}

	document.getElementById("subtract-form").addEventListener("submit", function (event) {
		event.preventDefault();
		var form = event.target;
		var target = selected(form);
		send("POST", "/api/entries/" + target.index + "/subtract", {
			amount: Number(form.elements.amount.value),
			note: form.elements.note.value,
			expectedName: target.name,
		}, form.querySelector("button")).then(function (ok) { if (ok) form.elements.amount.value = "0"; });
	});

	document.getElementById("add-form").addEventListener("submit", function (event) {
		event.preventDefault();
		var form = event.target;
		send("POST", "/api/entries", {
			name: form.elements.name.value,
			startValue: Number(form.elements.startValue.value),
			rate: Number(form.elements.rate.value),
		}, form.querySelector("button"));
	});

	document.getElementById("edit-form").addEventListener("submit", function (event) {
		event.preventDefault();
		var form = event.target;
		var target = selected(form);
		send("PUT", "/api/entries/" + target.index, {
			name: form.elements.name.value,
			currentValue: Number(form.elements.currentValue.value),
			rate: Number(form.elements.rate.value),
			expectedName: target.name,
		}, form.querySelector("button"));
	});

	document.getElementById("delete-form").addEventListener("submit", function (event) {
		event.preventDefault();
		var form = event.target;
		var target = selected(form);
		send("DELETE", "/api/entries/" + target.index, { expectedName: target.name }, form.querySelector("button"));
	});

	document.getElementById("reload-config").addEventListener("click", function (event) {
		var button = event.target;
		button.disabled = true;
		fetch("/api/config/reload", { method: "POST" })
			.then(function (res) { return res.json(); })
			.then(function (outcome) {
				show(outcome);
				showWarning(outcome.warning);
				return refresh();
			})
			.catch(function (error) { show({ ok: false, message: String(error) }); })
			.finally(function () { button.disabled = false; });
	});

	showWarning(JSON.parse(document.getElementById("config-warning-data").textContent));
	render();
	loadLog();
})();
`;

export function renderDashboard({ payload, configWarning }: DashboardPage) {
	return `<!doctype html>
<html lang="en">
<head>
<meta charset="utf-8">
<title>Live tally</title>
<style>${STYLE}</style>
</head>
<body>
<h1>Live incrementing variables</h1>
<p class="warning" id="config-warning" hidden></p>
<div id="entries"></div>
<p>Last saved baseline (UTC): <span id="baseline"></span></p>
<p id="status" role="status"></p>

<h2>Subtract</h2>
<form id="subtract-form">
	<select name="index" data-entries></select>
	<input name="amount" type="number" step="any" value="0" required>
	<input name="note" type="text" placeholder="Note">
	<button type="submit">Subtract</button>
</form>

<h2>Add entry</h2>
<form id="add-form">
	<input name="name" type="text" placeholder="Name" required>
	<input name="startValue" type="number" step="any" value="0" required>
	<input name="rate" type="number" step="any" value="0.1" required>
	<button type="submit">Add</button>
</form>

<h2>Edit entry</h2>
<form id="edit-form">
	<select name="index" data-entries></select>
	<input name="name" type="text" placeholder="New name" required>
	<input name="currentValue" type="number" step="any" value="0" required>
	<input name="rate" type="number" step="any" value="0.1" required>
	<button type="submit">Save</button>
</form>

<h2>Delete entry</h2>
<form id="delete-form">
	<select name="index" data-entries></select>
	<button type="submit">Delete</button>
</form>

<h2>Config</h2>
<p><button type="button" id="reload-config">Reload config.json (stored entries are kept)</button></p>

<h2>Recent transactions</h2>
<table>
	<thead><tr><th>#</th><th>When</th><th>Entry</th><th>Delta</th><th>Note</th><th>Actor</th></tr></thead>
	<tbody id="log"></tbody>
</table>

<script id="payload" type="application/json">${inlineJson(payload)}</script>
<script id="config-warning-data" type="application/json">${inlineJson(configWarning)}</script>
<script>${CLIENT_SCRIPT}</script>
</body>
</html>`;
}
