const DAYS = ['Sun', 'Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat'];
const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];

function pad2(n: number): string {
    return String(n).padStart(2, '0');
}

/** Local time as `Sat 18 Oct 14:35:02`. */
export function formatTime(date: Date): string {
    const day = DAYS[date.getDay()];
    const month = MONTHS[date.getMonth()];
    const clock = [date.getHours(), date.getMinutes(), date.getSeconds()].map(pad2).join(':');
    return `${day} ${pad2(date.getDate())} ${month} ${clock}`;
}
